/**
 * Environment readers used to compute option defaults. Every reader treats an
 * unset, blank or unparsable variable as absent so the caller's default wins.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * Interprets the variable as a boolean. Accepts "1/true/yes/on" and
 * "0/false/no/off" (case-insensitive).
 */
export function readBool(name: string, defaultValue: boolean): boolean {
  const normalised = normaliseEnvValue(process.env[name])?.toLowerCase();
  if (!normalised) {
    return defaultValue;
  }
  if (TRUE_LITERALS.has(normalised)) {
    return true;
  }
  if (FALSE_LITERALS.has(normalised)) {
    return false;
  }
  return defaultValue;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

export function readInt(name: string, defaultValue: number, options?: NumberOptions): number {
  return readOptionalInt(name, options) ?? defaultValue;
}

/** Returns the variable as a base-10 safe integer within the optional bounds. */
function readOptionalInt(name: string, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  if (options?.min !== undefined && value < options.min) {
    return undefined;
  }
  if (options?.max !== undefined && value > options.max) {
    return undefined;
  }
  return value;
}

export function readString(name: string, defaultValue: string): string {
  return readOptionalString(name) ?? defaultValue;
}

/** Returns the trimmed variable, or `undefined` when unset or blank. */
export function readOptionalString(name: string): string | undefined {
  return normaliseEnvValue(process.env[name]);
}
