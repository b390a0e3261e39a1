import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { JSONRPCMessage } from "@modelcontextprotocol/sdk/types.js";

import { StdioChildConnector, type ChildConnector } from "../children/connector.js";
import { LinkLifecycleManager } from "../children/lifecycle.js";
import { ChildLink } from "../children/link.js";
import { createManifestResolver, type ChildResolver } from "../children/manifest.js";
import type { StructuredLogger } from "../logger.js";
import { HostRequestSchema, isHostMethod } from "../protocol/schemas.js";
import { asJsonRpcError, MethodNotFoundError, toJsonRpc, ValidationError } from "../rpc/errors.js";
import { classifyMessage, encodeNotification, encodeResult, type JsonObject, type RequestId } from "../rpc/messages.js";
import { HUB_VERSION, type HubRuntimeOptions } from "../serverOptions.js";
import { createActiveChildDeriver, type ActiveChildSet } from "../state/activeChildren.js";
import { StateStore, type Derived } from "../state/store.js";
import { describeError } from "../types.js";
import { RequestBroadcaster } from "./broadcaster.js";
import { dispatchHostRequest, INITIAL_HUB_INPUTS, type HostResult, type HubInputs } from "./handlers.js";
import { NotificationRelay } from "./relay.js";

export interface PluginHubOptions {
  readonly logger: StructuredLogger;
  readonly runtime: HubRuntimeOptions;
  /** Starts plugin processes. Defaults to {@link StdioChildConnector}. */
  readonly connector?: ChildConnector;
  /** Lists the plugins of a root. Defaults to the manifest resolver. */
  readonly resolver?: ChildResolver;
}

/**
 * Top-level wiring: one host transport on one side, the plugin links on the
 * other. Host requests are validated, dispatched to their handler and answered
 * with the merged result; plugin notifications reach the host through the
 * relay.
 */
export class PluginHub {
  readonly store: StateStore<HubInputs>;
  readonly activeChildren: Derived<ActiveChildSet>;
  readonly lifecycle: LinkLifecycleManager;
  readonly broadcaster: RequestBroadcaster;
  readonly relay: NotificationRelay;

  private readonly logger: StructuredLogger;
  private readonly runtime: HubRuntimeOptions;
  private host: Transport | null = null;
  private disposePromise: Promise<void> | null = null;
  private resolveClosed: () => void = () => undefined;
  private readonly closedPromise: Promise<void>;

  constructor(options: PluginHubOptions) {
    this.logger = options.logger;
    this.runtime = options.runtime;
    this.closedPromise = new Promise((resolve) => {
      this.resolveClosed = resolve;
    });

    const connector = options.connector ?? new StdioChildConnector();
    const resolver = options.resolver ?? createManifestResolver({ fileName: options.runtime.manifestFile });
    const deriveActiveChildren = createActiveChildDeriver(resolver, {
      onDiscoveryError: (error, root) => {
        this.logger.warn("plugin_discovery_failed", { root: root.root, message: describeError(error) });
      },
    });

    this.store = new StateStore<HubInputs>(INITIAL_HUB_INPUTS, {
      onListenerError: (error, context) => {
        this.logger.error("state_listener_failed", { node: context.node, message: describeError(error) });
      },
    });
    this.activeChildren = this.store.derive("activeChildren", ["roots"], (inputs) =>
      deriveActiveChildren(inputs.roots),
    );

    this.lifecycle = new LinkLifecycleManager({
      activeChildren: this.activeChildren,
      logger: this.logger,
      createLink: (child) =>
        new ChildLink({
          child,
          connector,
          logger: this.logger,
          pluginVersions: this.runtime.pluginVersions,
          hubVersion: HUB_VERSION,
          requestTimeoutMs: this.runtime.requestTimeoutMs,
          handshakeTimeoutMs: this.runtime.handshakeTimeoutMs,
          handshakeState: () => ({
            versionCheck: this.store.get("versionCheck"),
            priorityFiles: this.store.get("priorityFiles"),
            subscriptions: this.store.get("subscriptions"),
          }),
        }),
    });

    this.relay = new NotificationRelay({
      logger: this.logger,
      notify: (method, params) => this.notifyHost(method, params),
      order: () => this.lifecycle.links().map((link) => link.identity),
    });

    this.broadcaster = new RequestBroadcaster({
      links: () => this.lifecycle.links(),
      logger: this.logger,
      onFailure: (failure) =>
        this.relay.reportPluginError({
          identity: failure.identity,
          name: failure.name,
          message: `${failure.method} failed: ${describeError(failure.error)}`,
          stackTrace: failure.trace,
        }),
    });

    this.lifecycle.addListener({
      onReady: (link) => this.relay.attach(link),
      onFailed: (link, error, trace) =>
        this.relay.reportPluginError({
          identity: link.identity,
          name: link.name,
          message: describeError(error),
          stackTrace: trace,
        }),
      onDisposed: (link) => this.relay.detach(link),
    });
    this.lifecycle.start();
  }

  get isDisposed(): boolean {
    return this.disposePromise !== null;
  }

  /** Resolves once the hub has been disposed. */
  whenClosed(): Promise<void> {
    return this.closedPromise;
  }

  /** Resolves once every pending handshake, roots push and disposal settled. */
  whenIdle(): Promise<void> {
    return this.lifecycle.whenIdle();
  }

  /** Serves the host over the transport. Closing it disposes the hub. */
  async connect(transport: Transport): Promise<void> {
    if (this.host) {
      throw new Error("the hub is already connected to a host");
    }
    this.host = transport;
    transport.onmessage = (message) => {
      void this.handleHostMessage(message);
    };
    transport.onerror = (error) => {
      this.logger.warn("host_transport_error", { message: describeError(error) });
    };
    transport.onclose = () => {
      this.logger.info("host_transport_closed");
      void this.dispose();
    };
    await transport.start();
    this.logger.info("hub_connected", { version: HUB_VERSION });
  }

  /** Sends a notification to the host; dropped once disposal started. */
  notifyHost(method: string, params: JsonObject): void {
    const host = this.host;
    if (!host || this.isDisposed) {
      return;
    }
    host.send(encodeNotification(method, params)).catch((error: unknown) => {
      this.logger.warn("host_notification_failed", { method, message: describeError(error) });
    });
  }

  /** Validates and runs one host request. Throws typed JSON-RPC errors. */
  async execute(id: RequestId, method: string, params: unknown): Promise<HostResult> {
    if (!isHostMethod(method)) {
      throw new MethodNotFoundError(method, { requestId: id });
    }
    const parsed = HostRequestSchema.safeParse({ method, params: params ?? {} });
    if (!parsed.success) {
      throw new ValidationError(`Invalid params for ${method}`, {
        requestId: id,
        issues: parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
      });
    }
    return dispatchHostRequest(parsed.data, {
      store: this.store,
      broadcaster: this.broadcaster,
      links: () => this.lifecycle.links(),
      minHostVersion: this.runtime.minHostVersion,
      logger: this.logger,
    });
  }

  /** Disposes every link, then closes the host transport. Idempotent. */
  dispose(): Promise<void> {
    if (!this.disposePromise) {
      this.disposePromise = this.teardown();
    }
    return this.disposePromise;
  }

  private async teardown(): Promise<void> {
    this.logger.info("hub_disposing", { links: this.lifecycle.links().length });
    try {
      this.store.dispose();
      await this.lifecycle.dispose();
      await this.relay.idle();
      const host = this.host;
      if (host) {
        await host.close();
      }
    } catch (error) {
      this.logger.error("hub_dispose_failed", { message: describeError(error) });
    } finally {
      this.logger.info("hub_disposed");
      this.resolveClosed();
    }
  }

  private async handleHostMessage(raw: JSONRPCMessage): Promise<void> {
    const message = classifyMessage(raw);
    switch (message.kind) {
      case "request":
        await this.answer(message.id, message.method, message.params);
        return;
      case "notification":
        this.logger.debug("host_notification_ignored", { method: message.method });
        return;
      case "result":
      case "error":
        this.logger.debug("host_response_ignored", { id: message.id });
        return;
      case "invalid":
        this.logger.warn("host_message_invalid", { reason: message.reason });
        return;
    }
  }

  private async answer(id: RequestId, method: string, params: unknown): Promise<void> {
    let response: JSONRPCMessage;
    try {
      const result = await this.execute(id, method, params);
      response = encodeResult(id, result);
    } catch (error) {
      const rpcError = asJsonRpcError(error, id);
      const level = rpcError.category === "INTERNAL" ? "error" : "warn";
      this.logger[level]("host_request_failed", {
        id,
        method,
        category: rpcError.category,
        message: rpcError.message,
      });
      response = toJsonRpc(id, rpcError);
    }

    const host = this.host;
    if (host) {
      try {
        await host.send(response);
      } catch (error) {
        this.logger.warn("host_response_failed", { id, method, message: describeError(error) });
      }
    }
    if (method === "shutdown") {
      await this.dispose();
    }
  }
}
