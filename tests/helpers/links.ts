import { ChildLink } from "../../src/children/link.js";
import type { StructuredLogger } from "../../src/logger.js";
import type { WorkspaceRoot } from "../../src/protocol/schemas.js";
import { descriptor, FakeConnector, root } from "./fakeChild.js";
import { RecordingLogger } from "./recordingLogger.js";

/** Builds a link for the named fake plugin without starting it. */
export function createLink(
  connector: FakeConnector,
  name: string,
  logger: StructuredLogger = new RecordingLogger(),
  roots: readonly WorkspaceRoot[] = [root("/work")],
): ChildLink {
  return new ChildLink({
    child: { ...descriptor(name), roots },
    connector,
    logger,
    pluginVersions: { min: "1.0.0", max: "2.0.0" },
    hubVersion: "0.4.0",
    requestTimeoutMs: 500,
    handshakeTimeoutMs: 500,
    handshakeState: () => ({ versionCheck: null, priorityFiles: [], subscriptions: {} }),
  });
}

/** Builds and starts one link per name, in order. */
export async function startLinks(connector: FakeConnector, names: readonly string[]): Promise<ChildLink[]> {
  const links = names.map((name) => createLink(connector, name));
  await Promise.all(links.map((link) => link.start()));
  return links;
}
