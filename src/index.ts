export { PluginHub, type PluginHubOptions } from "./orchestrator/hub.js";
export { RequestBroadcaster, PendingBroadcast } from "./orchestrator/broadcaster.js";
export type { BroadcastFailure, BroadcastRequest, BroadcastResponse } from "./orchestrator/broadcaster.js";
export { NotificationRelay, labelLines } from "./orchestrator/relay.js";
export { DiagnosticsAggregator } from "./orchestrator/diagnostics.js";
export { INITIAL_HUB_INPUTS, dispatchHostRequest, type HubInputs } from "./orchestrator/handlers.js";
export * from "./orchestrator/merge.js";
export { ChildLink, type LinkStatus } from "./children/link.js";
export { LinkLifecycleManager, type LinkLifecycleListener } from "./children/lifecycle.js";
export { StdioChildConnector, type ChildConnector } from "./children/connector.js";
export * from "./children/manifest.js";
export * from "./children/version.js";
export { StateStore, shallowEqual, type Derived, type StateListener } from "./state/store.js";
export * from "./state/activeChildren.js";
export { JsonRpcChannel, type ChannelEvent } from "./rpc/channel.js";
export * from "./rpc/errors.js";
export * from "./protocol/schemas.js";
export { StructuredLogger, type LogEntry, type LoggerOptions } from "./logger.js";
export { parseHubRuntimeOptions, HUB_NAME, HUB_VERSION, type HubRuntimeOptions } from "./serverOptions.js";
