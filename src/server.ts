import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { readBool } from "./config/env.js";
import { StructuredLogger } from "./logger.js";
import { PluginHub } from "./orchestrator/hub.js";
import { parseHubRuntimeOptions, type HubRuntimeOptions } from "./serverOptions.js";
import { describeError } from "./types.js";

/**
 * Bootstraps the hub when the module is executed directly via the CLI: parses
 * the runtime options, serves the host over stdio and registers shutdown hooks.
 */
async function main(): Promise<void> {
  let options: HubRuntimeOptions;
  try {
    options = parseHubRuntimeOptions(process.argv.slice(2));
  } catch (error) {
    new StructuredLogger().error("cli_options_invalid", { message: describeError(error) });
    process.exit(1);
  }

  const logger = new StructuredLogger({
    logFile: options.logFile,
    redactionEnabled: readBool("PLUGINPLEX_LOG_REDACT", true),
  });
  const hub = new PluginHub({ logger, runtime: options });

  const shutdown = async (signal: string): Promise<void> => {
    logger.warn("shutdown_signal", { signal });
    await hub.dispose();
  };
  process.once("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.once("SIGTERM", () => {
    void shutdown("SIGTERM");
  });

  await hub.connect(new StdioServerTransport());
  logger.info("stdio_listening", {
    request_timeout_ms: options.requestTimeoutMs,
    handshake_timeout_ms: options.handshakeTimeoutMs,
    manifest: options.manifestFile,
  });

  await hub.whenClosed();
  await logger.flush();
  process.exit(0);
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    new StructuredLogger().error("hub_crashed", { message: describeError(error) });
    process.exit(1);
  });
}
