import { isDeepStrictEqual } from "node:util";

import type { ChildIdentity } from "../children/manifest.js";
import type { Diagnostic } from "../protocol/schemas.js";

export interface DiagnosticsAggregatorOptions {
  /** Current link order; contributions are unioned in this order. */
  readonly order: () => readonly ChildIdentity[];
  /** Receives the merged list of a file whenever it differs from the last one sent. */
  readonly emit: (file: string, diagnostics: Diagnostic[]) => void;
}

/**
 * Latest-wins diagnostics per plugin and file. The union for a file is sent
 * upstream only when it differs from the previous emission; a file nobody
 * reported yet counts as having an empty list.
 */
export class DiagnosticsAggregator {
  private readonly contributions = new Map<string, Map<ChildIdentity, Diagnostic[]>>();
  private readonly lastEmitted = new Map<string, Diagnostic[]>();

  constructor(private readonly options: DiagnosticsAggregatorOptions) {}

  /** Replaces one plugin's diagnostics for a file. Returns whether an emission happened. */
  update(identity: ChildIdentity, file: string, diagnostics: readonly Diagnostic[]): boolean {
    let perChild = this.contributions.get(file);
    if (!perChild) {
      perChild = new Map();
      this.contributions.set(file, perChild);
    }
    perChild.set(identity, [...diagnostics]);
    return this.publish(file);
  }

  /** Drops every contribution of a plugin and re-publishes the files it touched. */
  remove(identity: ChildIdentity): string[] {
    const republished: string[] = [];
    for (const [file, perChild] of [...this.contributions]) {
      if (!perChild.delete(identity)) {
        continue;
      }
      if (perChild.size === 0) {
        this.contributions.delete(file);
      }
      if (this.publish(file)) {
        republished.push(file);
      }
    }
    return republished;
  }

  /** Union currently attributed to the file, in link order. */
  merged(file: string): Diagnostic[] {
    const perChild = this.contributions.get(file);
    if (!perChild) {
      return [];
    }
    const merged: Diagnostic[] = [];
    const seen = new Set<ChildIdentity>();
    for (const identity of this.options.order()) {
      const list = perChild.get(identity);
      if (list) {
        merged.push(...list);
        seen.add(identity);
      }
    }
    // Contributors missing from the order keep their arrival order at the end.
    for (const [identity, list] of perChild) {
      if (!seen.has(identity)) {
        merged.push(...list);
      }
    }
    return merged;
  }

  /** Last list sent upstream for the file. */
  lastSent(file: string): readonly Diagnostic[] {
    return this.lastEmitted.get(file) ?? [];
  }

  private publish(file: string): boolean {
    const next = this.merged(file);
    if (isDeepStrictEqual(this.lastSent(file), next)) {
      return false;
    }
    if (next.length === 0) {
      this.lastEmitted.delete(file);
    } else {
      this.lastEmitted.set(file, next);
    }
    this.options.emit(file, next);
    return true;
  }
}
