import type {
  AssistsResult,
  AvailableRefactoringsResult,
  CompletionResult,
  Diagnostic,
  DiagnosticsResult,
  FixesResult,
  NavigationRegion,
  NavigationResult,
  NavigationTarget,
  RefactoringResult,
} from "../protocol/schemas.js";

/**
 * Merge rules applied to the successful plugin replies of one broadcast. Every
 * function receives the replies in link order and never mutates them.
 */

/** Per file; files shared by several plugins concatenate in link order. */
export function mergeDiagnostics(results: readonly DiagnosticsResult[]): DiagnosticsResult {
  const byFile = new Map<string, Diagnostic[]>();
  for (const result of results) {
    for (const entry of result.diagnostics) {
      const list = byFile.get(entry.file);
      if (list) {
        list.push(...entry.diagnostics);
      } else {
        byFile.set(entry.file, [...entry.diagnostics]);
      }
    }
  }
  return { diagnostics: [...byFile].map(([file, diagnostics]) => ({ file, diagnostics })) };
}

export function mergeFixes(results: readonly FixesResult[]): FixesResult {
  return { fixes: results.flatMap((result) => result.fixes) };
}

export function mergeAssists(results: readonly AssistsResult[]): AssistsResult {
  return { assists: results.flatMap((result) => result.assists) };
}

/** Ordered union: a kind keeps the position of its first appearance. */
export function mergeAvailableRefactorings(results: readonly AvailableRefactoringsResult[]): AvailableRefactoringsResult {
  const kinds = new Set<string>();
  for (const result of results) {
    for (const kind of result.kinds) {
      kinds.add(kind);
    }
  }
  return { kinds: [...kinds] };
}

export function mergeRefactoring(results: readonly RefactoringResult[]): RefactoringResult {
  for (const result of results) {
    if (result.refactoring !== null) {
      return { refactoring: result.refactoring };
    }
  }
  return { refactoring: null };
}

/**
 * Unions the file tables and re-bases every index into the merged arrays.
 * Regions covering the same span share one entry whose targets accumulate.
 */
export function mergeNavigation(results: readonly NavigationResult[]): NavigationResult {
  const files: string[] = [];
  const fileIndex = new Map<string, number>();
  const targets: NavigationTarget[] = [];
  const regions: NavigationRegion[] = [];
  const regionBySpan = new Map<string, NavigationRegion>();

  for (const result of results) {
    const fileMapping = result.files.map((file) => {
      const known = fileIndex.get(file);
      if (known !== undefined) {
        return known;
      }
      files.push(file);
      fileIndex.set(file, files.length - 1);
      return files.length - 1;
    });
    const targetBase = targets.length;
    for (const target of result.targets) {
      targets.push({ ...target, fileIndex: fileMapping[target.fileIndex] });
    }
    for (const region of result.regions) {
      const rebased = region.targets.map((index) => index + targetBase);
      const span = `${region.offset}:${region.length}`;
      const existing = regionBySpan.get(span);
      if (existing) {
        existing.targets.push(...rebased);
        continue;
      }
      const merged: NavigationRegion = { ...region, targets: rebased };
      regionBySpan.set(span, merged);
      regions.push(merged);
    }
  }

  return { files, targets, regions };
}

/**
 * Concatenates suggestions. The replacement range comes from the first
 * responding plugin, or `-1/-1` when none answered.
 */
export function mergeCompletion(results: readonly CompletionResult[]): CompletionResult {
  const first = results[0];
  return {
    replacementOffset: first ? first.replacementOffset : -1,
    replacementLength: first ? first.replacementLength : -1,
    suggestions: results.flatMap((result) => result.suggestions),
  };
}
