import { readInt, readOptionalString, readString } from "./config/env.js";
import { DEFAULT_MANIFEST_FILE } from "./children/manifest.js";
import { compareVersions, InvalidVersionError, parseVersion, type VersionRange } from "./children/version.js";

/** Name advertised to the host in `version/check` replies. */
export const HUB_NAME = "pluginplex";

/** Version of the hub, sent to plugins when the host has not sent its own. */
export const HUB_VERSION = "0.4.0";

/** Contact shown by hosts next to the hub's name. */
export const HUB_CONTACT = "Report issues to the maintainers of your pluginplex installation.";

/**
 * Runtime configuration parsed from CLI arguments, with defaults taken from
 * `PLUGINPLEX_*` environment variables.
 */
export interface HubRuntimeOptions {
  /** Mirror of the JSON log lines, rotated by size. `null` keeps stderr only. */
  logFile: string | null;
  /** Budget of a forwarded request before the plugin counts as failed. */
  requestTimeoutMs: number;
  /** Budget of each handshake request. */
  handshakeTimeoutMs: number;
  /** Inclusive range of plugin versions accepted during the handshake. */
  pluginVersions: VersionRange;
  /** Oldest host version reported as compatible by `version/check`. */
  minHostVersion: string;
  /** Manifest file looked up at the top of every workspace root. */
  manifestFile: string;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;
export const DEFAULT_MIN_PLUGIN_VERSION = "0.0.1";
export const DEFAULT_MIN_HOST_VERSION = "1.0.0";

const FLAG_WITH_VALUE = new Set([
  "--log-file",
  "--request-timeout-ms",
  "--handshake-timeout-ms",
  "--min-plugin-version",
  "--max-plugin-version",
  "--min-host-version",
  "--manifest",
]);

function parsePositiveInteger(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isFinite(num) || !Number.isInteger(num) || num <= 0) {
    throw new Error(`The value ${value} for ${flag} must be a positive integer.`);
  }
  return num;
}

function parseVersionFlag(value: string, flag: string): string {
  const trimmed = value.trim();
  try {
    parseVersion(trimmed);
  } catch (error) {
    if (error instanceof InvalidVersionError) {
      throw new Error(`The value ${value} for ${flag} must be a version such as 1.2.3.`);
    }
    throw error;
  }
  return trimmed;
}

function parseNonEmpty(value: string, flag: string): string {
  const trimmed = value.trim();
  if (!trimmed.length) {
    throw new Error(`The value for ${flag} cannot be empty.`);
  }
  return trimmed;
}

/** Environment version, or `undefined` when unset or not a version. */
function readVersion(name: string): string | undefined {
  const raw = readOptionalString(name);
  if (raw === undefined) {
    return undefined;
  }
  try {
    parseVersion(raw);
    return raw;
  } catch {
    return undefined;
  }
}

/** Defaults computed from the environment before flags are applied. */
function defaultsFromEnvironment(): HubRuntimeOptions {
  return {
    logFile: readOptionalString("PLUGINPLEX_LOG_FILE") ?? null,
    requestTimeoutMs: readInt("PLUGINPLEX_REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS, { min: 1 }),
    handshakeTimeoutMs: readInt("PLUGINPLEX_HANDSHAKE_TIMEOUT_MS", DEFAULT_HANDSHAKE_TIMEOUT_MS, { min: 1 }),
    pluginVersions: {
      min: readVersion("PLUGINPLEX_MIN_PLUGIN_VERSION") ?? DEFAULT_MIN_PLUGIN_VERSION,
      max: readVersion("PLUGINPLEX_MAX_PLUGIN_VERSION") ?? null,
    },
    minHostVersion: readVersion("PLUGINPLEX_MIN_HOST_VERSION") ?? DEFAULT_MIN_HOST_VERSION,
    manifestFile: readString("PLUGINPLEX_MANIFEST", DEFAULT_MANIFEST_FILE),
  };
}

/**
 * Parses `process.argv.slice(2)`. Flags accept `--flag value` and
 * `--flag=value`; unknown arguments are ignored. Errors name the offending
 * flag.
 */
export function parseHubRuntimeOptions(argv: readonly string[]): HubRuntimeOptions {
  const state = defaultsFromEnvironment();
  let minPluginVersion = state.pluginVersions.min;
  let maxPluginVersion = state.pluginVersions.max;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg.startsWith("--")) {
      continue;
    }

    const separator = arg.indexOf("=");
    const flag = separator >= 0 ? arg.slice(0, separator) : arg;
    let value = separator >= 0 ? arg.slice(separator + 1) : undefined;
    if (!FLAG_WITH_VALUE.has(flag)) {
      continue;
    }
    if (value === undefined || value === "") {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`The flag ${flag} requires a value.`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--log-file":
        state.logFile = parseNonEmpty(value, flag);
        break;
      case "--request-timeout-ms":
        state.requestTimeoutMs = parsePositiveInteger(value, flag);
        break;
      case "--handshake-timeout-ms":
        state.handshakeTimeoutMs = parsePositiveInteger(value, flag);
        break;
      case "--min-plugin-version":
        minPluginVersion = parseVersionFlag(value, flag);
        break;
      case "--max-plugin-version":
        maxPluginVersion = parseVersionFlag(value, flag);
        break;
      case "--min-host-version":
        state.minHostVersion = parseVersionFlag(value, flag);
        break;
      case "--manifest":
        state.manifestFile = parseNonEmpty(value, flag);
        break;
    }
  }

  if (maxPluginVersion !== null && compareVersions(maxPluginVersion, minPluginVersion) < 0) {
    throw new Error(`The flag --max-plugin-version (${maxPluginVersion}) cannot be lower than ${minPluginVersion}.`);
  }
  state.pluginVersions = { min: minPluginVersion, max: maxPluginVersion };
  return state;
}
