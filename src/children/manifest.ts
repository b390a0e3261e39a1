import { readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { z } from "zod";

import type { WorkspaceRoot } from "../protocol/schemas.js";

/** Stable key of a plugin: `"<name>@<absolute plugin directory>"`. */
export type ChildIdentity = string;

/** How a plugin process is started. */
export interface ChildLaunch {
  readonly command: string;
  readonly args: readonly string[];
  /** Absolute working directory of the plugin. */
  readonly cwd: string;
  readonly env: Readonly<Record<string, string>>;
}

export interface ChildDescriptor {
  readonly identity: ChildIdentity;
  readonly name: string;
  readonly launch: ChildLaunch;
}

/**
 * Lists the plugins that apply to one workspace root. Resolvers run inside the
 * store's synchronous recomputation, hence the synchronous signature.
 */
export type ChildResolver = (root: WorkspaceRoot) => readonly ChildDescriptor[];

export const DEFAULT_MANIFEST_FILE = "pluginplex.json";

const ManifestEntrySchema = z
  .object({
    name: z.string().trim().min(1, "plugin name must not be empty"),
    command: z.string().trim().min(1, "plugin command must not be empty"),
    args: z.array(z.string()).default([]),
    cwd: z.string().trim().min(1).optional(),
    env: z.record(z.string()).default({}),
  })
  .strict();

const ManifestSchema = z
  .object({
    plugins: z.array(ManifestEntrySchema).default([]),
  })
  .strict();

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

/** Raised when a manifest exists but cannot be read or validated. */
export class ManifestError extends Error {
  constructor(
    readonly manifestPath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`invalid plugin manifest ${manifestPath}: ${message}`, options);
    this.name = "ManifestError";
  }
}

export interface ManifestResolverOptions {
  /** File looked up at the top of every root. */
  readonly fileName?: string;
  /** Reads the manifest; returns `null` when it does not exist. */
  readonly readFile?: (path: string) => string | null;
}

export function childIdentity(name: string, directory: string): ChildIdentity {
  return `${name}@${directory}`;
}

/** Turns validated manifest entries into descriptors anchored at `root`. */
export function describeEntries(root: string, entries: readonly ManifestEntry[]): ChildDescriptor[] {
  return entries.map((entry) => {
    const cwd = resolve(root, entry.cwd ?? ".");
    return {
      identity: childIdentity(entry.name, cwd),
      name: entry.name,
      launch: { command: entry.command, args: [...entry.args], cwd, env: { ...entry.env } },
    };
  });
}

/**
 * Default {@link ChildResolver}: reads the manifest at the top of the root. A
 * root without manifest has no plugins.
 */
export function createManifestResolver(options: ManifestResolverOptions = {}): ChildResolver {
  const fileName = options.fileName ?? DEFAULT_MANIFEST_FILE;
  const readFile = options.readFile ?? readManifestFile;

  return (root) => {
    const manifestPath = join(root.root, fileName);
    const source = readFile(manifestPath);
    if (source === null) {
      return [];
    }
    let document: unknown;
    try {
      document = JSON.parse(source);
    } catch (error) {
      throw new ManifestError(manifestPath, "not valid JSON", { cause: error });
    }
    const parsed = ManifestSchema.safeParse(document);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      throw new ManifestError(manifestPath, details);
    }
    return describeEntries(root.root, parsed.data.plugins);
  };
}

function readManifestFile(path: string): string | null {
  try {
    return readFileSync(path, "utf8");
  } catch (error) {
    if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw new ManifestError(path, error instanceof Error ? error.message : String(error), { cause: error });
  }
}
