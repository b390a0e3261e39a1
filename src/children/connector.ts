import { getDefaultEnvironment, StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";

import type { ChildDescriptor } from "./manifest.js";

/**
 * Opens the transport to a plugin. The returned transport is not started; the
 * link's channel starts it once its handlers are installed.
 */
export interface ChildConnector {
  connect(child: ChildDescriptor): Transport | Promise<Transport>;
}

/** Spawns every plugin as a subprocess speaking newline-delimited JSON-RPC over stdio. */
export class StdioChildConnector implements ChildConnector {
  connect(child: ChildDescriptor): Transport {
    return new StdioClientTransport({
      command: child.launch.command,
      args: [...child.launch.args],
      cwd: child.launch.cwd,
      env: { ...getDefaultEnvironment(), ...child.launch.env },
      stderr: "inherit",
    });
  }
}
