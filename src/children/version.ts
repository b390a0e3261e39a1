/**
 * Dotted version handling used by the plugin handshake and the host version
 * check. Only `major.minor.patch` with an optional pre-release suffix is
 * understood; a pre-release sorts before the matching release.
 */
export interface ParsedVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly prerelease: string | null;
}

/** Inclusive range. A `null` upper bound accepts every later version. */
export interface VersionRange {
  readonly min: string;
  readonly max: string | null;
}

const VERSION_PATTERN = /^v?(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:-([0-9A-Za-z.-]+))?(?:\+[0-9A-Za-z.-]+)?$/;

export class InvalidVersionError extends Error {
  constructor(readonly input: string) {
    super(`"${input}" is not a valid version`);
    this.name = "InvalidVersionError";
  }
}

export function parseVersion(input: string): ParsedVersion {
  const match = VERSION_PATTERN.exec(input.trim());
  if (!match) {
    throw new InvalidVersionError(input);
  }
  return {
    major: Number.parseInt(match[1], 10),
    minor: match[2] ? Number.parseInt(match[2], 10) : 0,
    patch: match[3] ? Number.parseInt(match[3], 10) : 0,
    prerelease: match[4] ?? null,
  };
}

/** Negative when `left < right`, zero when equal, positive otherwise. */
export function compareVersions(left: string, right: string): number {
  const a = parseVersion(left);
  const b = parseVersion(right);
  if (a.major !== b.major) return a.major - b.major;
  if (a.minor !== b.minor) return a.minor - b.minor;
  if (a.patch !== b.patch) return a.patch - b.patch;
  if (a.prerelease === b.prerelease) return 0;
  if (a.prerelease === null) return 1;
  if (b.prerelease === null) return -1;
  return a.prerelease < b.prerelease ? -1 : 1;
}

export function isWithinRange(version: string, range: VersionRange): boolean {
  if (compareVersions(version, range.min) < 0) {
    return false;
  }
  return range.max === null || compareVersions(version, range.max) <= 0;
}

export function formatRange(range: VersionRange): string {
  return range.max === null ? `>=${range.min}` : `${range.min} - ${range.max}`;
}
