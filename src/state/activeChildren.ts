import type { ChildDescriptor, ChildIdentity, ChildResolver } from "../children/manifest.js";
import type { WorkspaceRoot } from "../protocol/schemas.js";

/** A plugin that applies to at least one current workspace root. */
export interface ActiveChild extends ChildDescriptor {
  readonly roots: readonly WorkspaceRoot[];
}

/** Active plugins keyed by identity, in discovery order. */
export type ActiveChildSet = ReadonlyMap<ChildIdentity, ActiveChild>;

export interface ActiveChildDeriverOptions {
  /** Invoked when resolving one root fails; that root contributes no plugin. */
  readonly onDiscoveryError?: (error: unknown, root: WorkspaceRoot) => void;
}

export const EMPTY_ACTIVE_SET: ActiveChildSet = new Map();

/**
 * Returns the derivation used by the store. The last result is memoized on the
 * canonical content of the roots, so the same roots yield the same instance
 * and subscribers see no change.
 */
export function createActiveChildDeriver(
  resolver: ChildResolver,
  options: ActiveChildDeriverOptions = {},
): (roots: readonly WorkspaceRoot[]) => ActiveChildSet {
  let lastKey: string | null = null;
  let lastValue: ActiveChildSet = EMPTY_ACTIVE_SET;

  return (roots) => {
    const key = canonicalRootsKey(roots);
    if (key === lastKey) {
      return lastValue;
    }
    lastValue = deriveActiveChildSet(roots, resolver, options);
    lastKey = key;
    return lastValue;
  };
}

/** Maps every root through the resolver and merges identities shared by several roots. */
export function deriveActiveChildSet(
  roots: readonly WorkspaceRoot[],
  resolver: ChildResolver,
  options: ActiveChildDeriverOptions = {},
): ActiveChildSet {
  if (roots.length === 0) {
    return EMPTY_ACTIVE_SET;
  }
  const merged = new Map<ChildIdentity, { descriptor: ChildDescriptor; roots: WorkspaceRoot[] }>();
  for (const root of roots) {
    let descriptors: readonly ChildDescriptor[];
    try {
      descriptors = resolver(root);
    } catch (error) {
      options.onDiscoveryError?.(error, root);
      continue;
    }
    for (const descriptor of descriptors) {
      const existing = merged.get(descriptor.identity);
      if (existing) {
        if (!existing.roots.includes(root)) {
          existing.roots.push(root);
        }
        continue;
      }
      merged.set(descriptor.identity, { descriptor, roots: [root] });
    }
  }

  const result = new Map<ChildIdentity, ActiveChild>();
  for (const [identity, { descriptor, roots: applicable }] of merged) {
    result.set(identity, { ...descriptor, roots: applicable });
  }
  return result;
}

/** Order-sensitive serialisation of the fields that influence discovery. */
export function canonicalRootsKey(roots: readonly WorkspaceRoot[]): string {
  return JSON.stringify(
    roots.map((root) => [root.root, [...root.exclude], root.optionsFile ?? null]),
  );
}

/** Whether `file` lies inside `root` and outside its exclusions. */
export function isFileInRoot(file: string, root: WorkspaceRoot): boolean {
  if (!isWithinDirectory(file, root.root)) {
    return false;
  }
  return !root.exclude.some((excluded) => isWithinDirectory(file, excluded));
}

function isWithinDirectory(file: string, directory: string): boolean {
  const base = directory.endsWith("/") ? directory.slice(0, -1) : directory;
  return file === base || file.startsWith(`${base}/`);
}
