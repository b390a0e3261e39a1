import { afterEach, describe, it } from "mocha";
import { expect } from "chai";

import {
  DEFAULT_HANDSHAKE_TIMEOUT_MS,
  DEFAULT_MIN_HOST_VERSION,
  DEFAULT_MIN_PLUGIN_VERSION,
  DEFAULT_REQUEST_TIMEOUT_MS,
  parseHubRuntimeOptions,
} from "../src/serverOptions.js";

const ENV_KEYS = [
  "PLUGINPLEX_LOG_FILE",
  "PLUGINPLEX_REQUEST_TIMEOUT_MS",
  "PLUGINPLEX_HANDSHAKE_TIMEOUT_MS",
  "PLUGINPLEX_MIN_PLUGIN_VERSION",
  "PLUGINPLEX_MAX_PLUGIN_VERSION",
  "PLUGINPLEX_MIN_HOST_VERSION",
  "PLUGINPLEX_MANIFEST",
] as const;

describe("parseHubRuntimeOptions", () => {
  const saved = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  function clearEnv(): void {
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
  }

  it("returns the defaults when no flag nor variable is set", () => {
    clearEnv();
    expect(parseHubRuntimeOptions([])).to.deep.equal({
      logFile: null,
      requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
      handshakeTimeoutMs: DEFAULT_HANDSHAKE_TIMEOUT_MS,
      pluginVersions: { min: DEFAULT_MIN_PLUGIN_VERSION, max: null },
      minHostVersion: DEFAULT_MIN_HOST_VERSION,
      manifestFile: "pluginplex.json",
    });
  });

  it("accepts both separated and inline flag values", () => {
    clearEnv();
    const options = parseHubRuntimeOptions([
      "--log-file",
      "/tmp/hub.log",
      "--request-timeout-ms=1500",
      "--handshake-timeout-ms",
      "250",
      "--min-plugin-version=1.2.0",
      "--max-plugin-version",
      "2.0.0",
      "--min-host-version",
      "3.0",
      "--manifest=plugins.json",
      "positional",
      "--unknown-flag",
    ]);

    expect(options).to.deep.equal({
      logFile: "/tmp/hub.log",
      requestTimeoutMs: 1500,
      handshakeTimeoutMs: 250,
      pluginVersions: { min: "1.2.0", max: "2.0.0" },
      minHostVersion: "3.0",
      manifestFile: "plugins.json",
    });
  });

  it("takes defaults from the environment and lets flags override them", () => {
    clearEnv();
    process.env.PLUGINPLEX_REQUEST_TIMEOUT_MS = "4000";
    process.env.PLUGINPLEX_MAX_PLUGIN_VERSION = "5.0.0";
    process.env.PLUGINPLEX_LOG_FILE = "/var/log/pluginplex.log";

    const options = parseHubRuntimeOptions(["--request-timeout-ms", "900"]);

    expect(options.requestTimeoutMs).to.equal(900);
    expect(options.pluginVersions).to.deep.equal({ min: DEFAULT_MIN_PLUGIN_VERSION, max: "5.0.0" });
    expect(options.logFile).to.equal("/var/log/pluginplex.log");
  });

  it("ignores unusable environment values", () => {
    clearEnv();
    process.env.PLUGINPLEX_HANDSHAKE_TIMEOUT_MS = "-3";
    process.env.PLUGINPLEX_MIN_HOST_VERSION = "latest";

    const options = parseHubRuntimeOptions([]);

    expect(options.handshakeTimeoutMs).to.equal(DEFAULT_HANDSHAKE_TIMEOUT_MS);
    expect(options.minHostVersion).to.equal(DEFAULT_MIN_HOST_VERSION);
  });

  it("names the offending flag in errors", () => {
    clearEnv();
    expect(() => parseHubRuntimeOptions(["--request-timeout-ms", "0"])).to.throw(
      "The value 0 for --request-timeout-ms must be a positive integer.",
    );
    expect(() => parseHubRuntimeOptions(["--min-host-version", "soon"])).to.throw(
      "The value soon for --min-host-version must be a version such as 1.2.3.",
    );
    expect(() => parseHubRuntimeOptions(["--log-file"])).to.throw("The flag --log-file requires a value.");
    expect(() => parseHubRuntimeOptions(["--manifest", "--log-file", "x"])).to.throw(
      "The flag --manifest requires a value.",
    );
  });

  it("rejects a plugin range whose upper bound is below its lower bound", () => {
    clearEnv();
    expect(() =>
      parseHubRuntimeOptions(["--min-plugin-version", "2.0.0", "--max-plugin-version", "1.0.0"]),
    ).to.throw("The flag --max-plugin-version (1.0.0) cannot be lower than 2.0.0.");
  });
});
