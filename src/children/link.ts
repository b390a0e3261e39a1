import { MessageQueue } from "../events/stream.js";
import type { StructuredLogger } from "../logger.js";
import {
  ChildPluginErrorParamsSchema,
  DiagnosticsChangedParamsSchema,
  HandshakeResultSchema,
  NOTIFICATIONS,
  PrintParamsSchema,
  type FileDiagnostics,
  type HandshakeResult,
  type VersionCheckParams,
  type WorkspaceRoot,
} from "../protocol/schemas.js";
import { JsonRpcChannel, type RequestOptions } from "../rpc/channel.js";
import { ChannelClosedError } from "../rpc/errors.js";
import { asJsonObject, type JsonObject } from "../rpc/messages.js";
import type { ActiveChild } from "../state/activeChildren.js";
import { describeError, failure } from "../types.js";
import type { ChildConnector } from "./connector.js";
import type { ChildIdentity } from "./manifest.js";
import { formatRange, isWithinRange, type VersionRange } from "./version.js";

export type LinkStatus =
  | { readonly state: "pending" }
  | { readonly state: "ready"; readonly version: string; readonly handshake: HandshakeResult }
  | { readonly state: "failed"; readonly error: Error; readonly trace: string };

/** Error surfaced by a plugin outside of any request. */
export interface InternalErrorEvent {
  readonly message: string;
  readonly stackTrace: string;
}

/** Plugin notification with no dedicated queue, forwarded verbatim. */
export interface PassthroughNotification {
  readonly method: string;
  readonly params: JsonObject;
}

/** Host state replayed to a plugin while it handshakes. */
export interface HandshakeState {
  /** Last `version/check` payload sent by the host, if any. */
  readonly versionCheck: VersionCheckParams | null;
  readonly priorityFiles: readonly string[];
  readonly subscriptions: Readonly<Record<string, readonly string[]>>;
}

export interface ChildLinkOptions {
  readonly child: ActiveChild;
  readonly connector: ChildConnector;
  readonly logger: StructuredLogger;
  readonly pluginVersions: VersionRange;
  /** Version advertised when the host has not sent `version/check` yet. */
  readonly hubVersion: string;
  readonly requestTimeoutMs?: number;
  readonly handshakeTimeoutMs?: number;
  readonly handshakeState: () => HandshakeState;
}

export class IncompatiblePluginError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IncompatiblePluginError";
  }
}

/**
 * Connection to one running plugin. A link starts `pending`, moves once to
 * `ready` or `failed`, and never leaves that state; disposal only sets the
 * {@link isDisposed} flag. Plugin notifications are sorted into four FIFO
 * queues that the relay drains.
 */
export class ChildLink {
  readonly identity: ChildIdentity;
  readonly name: string;

  readonly diagnostics: MessageQueue<FileDiagnostics>;
  readonly prints: MessageQueue<string>;
  readonly internalErrors: MessageQueue<InternalErrorEvent>;
  readonly notifications: MessageQueue<PassthroughNotification>;

  private currentStatus: LinkStatus = { state: "pending" };
  private currentRoots: readonly WorkspaceRoot[];
  private channel: JsonRpcChannel | null = null;
  private startPromise: Promise<LinkStatus> | null = null;
  private pumpDone: Promise<void> = Promise.resolve();
  private disposePromise: Promise<void> | null = null;
  private readonly logger: StructuredLogger;

  constructor(private readonly options: ChildLinkOptions) {
    this.identity = options.child.identity;
    this.name = options.child.name;
    this.currentRoots = options.child.roots;
    this.logger = options.logger.forChild(this.identity);
    this.diagnostics = new MessageQueue(`${this.name} diagnostics`);
    this.prints = new MessageQueue(`${this.name} prints`);
    this.internalErrors = new MessageQueue(`${this.name} errors`);
    this.notifications = new MessageQueue(`${this.name} notifications`);
  }

  get status(): LinkStatus {
    return this.currentStatus;
  }

  get isReady(): boolean {
    return !this.isDisposed && this.currentStatus.state === "ready";
  }

  get isDisposed(): boolean {
    return this.disposePromise !== null;
  }

  get roots(): readonly WorkspaceRoot[] {
    return this.currentRoots;
  }

  /** Connects and handshakes once; later calls return the same settlement. */
  start(): Promise<LinkStatus> {
    if (!this.startPromise) {
      this.startPromise = this.handshake();
    }
    return this.startPromise;
  }

  /** Sends a request over the link's channel. */
  async request(method: string, params: JsonObject, options?: RequestOptions): Promise<unknown> {
    const channel = this.channel;
    if (!channel || this.isDisposed) {
      throw new ChannelClosedError(this.name);
    }
    return channel.request(method, params, options);
  }

  /**
   * Records new applicable roots. A ready plugin receives them with `roots/set`
   * and keeps running; a failed push is surfaced on {@link internalErrors}.
   */
  async updateRoots(roots: readonly WorkspaceRoot[]): Promise<void> {
    this.currentRoots = roots;
    if (!this.isReady) {
      return;
    }
    try {
      await this.request("roots/set", { roots: [...roots] });
      this.logger.debug("link_roots_updated", { roots: roots.map((root) => root.root) });
    } catch (error) {
      this.reportInternalError(error);
    }
  }

  /** Closes the queues and the channel. In-flight requests reject. */
  dispose(): Promise<void> {
    if (!this.disposePromise) {
      this.disposePromise = this.teardown();
    }
    return this.disposePromise;
  }

  private async teardown(): Promise<void> {
    this.closeQueues();
    await this.closeChannel();
    await this.pumpDone;
    this.logger.info("link_disposed", { status: this.currentStatus.state });
  }

  private async handshake(): Promise<LinkStatus> {
    try {
      const transport = await this.options.connector.connect(this.options.child);
      const channel = new JsonRpcChannel(transport, {
        label: this.name,
        requestTimeoutMs: this.options.requestTimeoutMs,
        logger: this.logger,
      });
      this.channel = channel;
      if (this.isDisposed) {
        await channel.close();
        return this.currentStatus;
      }
      await channel.start();
      this.pumpDone = this.pump(channel);

      const versionCheck: JsonObject = this.options.handshakeState().versionCheck ?? {
        version: this.options.hubVersion,
      };
      const timeoutMs = this.options.handshakeTimeoutMs;
      const reply = HandshakeResultSchema.parse(await channel.request("version/check", versionCheck, { timeoutMs }));
      this.ensureCompatible(reply);

      // Read after the version check: the host may have changed these meanwhile.
      const state = this.options.handshakeState();
      const sentRoots = this.currentRoots;
      await channel.request("roots/set", { roots: [...sentRoots] }, { timeoutMs });
      if (state.priorityFiles.length > 0) {
        await channel.request("priorityFiles/set", { files: [...state.priorityFiles] }, { timeoutMs });
      }
      if (Object.keys(state.subscriptions).length > 0) {
        await channel.request("subscriptions/set", { subscriptions: { ...state.subscriptions } }, { timeoutMs });
      }
      if (this.isDisposed) {
        return this.currentStatus;
      }

      this.currentStatus = { state: "ready", version: reply.version, handshake: reply };
      this.logger.info("link_ready", { name: this.name, version: reply.version });
      if (this.currentRoots !== sentRoots) {
        await this.updateRoots(this.currentRoots);
      }
      await this.pushHostStateChanges(state);
    } catch (error) {
      if (this.isDisposed) {
        this.logger.debug("link_handshake_abandoned", { reason: describeError(error) });
        return this.currentStatus;
      }
      const failed = failure(error);
      this.currentStatus = { state: "failed", error: failed.error, trace: failed.trace };
      this.logger.warn("link_failed", { name: this.name, message: describeError(failed.error) });
      // A failed link is never relayed.
      this.closeQueues();
      await this.closeChannel();
    }
    return this.currentStatus;
  }

  /**
   * Sends the priority files and subscriptions the host changed while the
   * handshake was replaying `replayed`. Broadcasts skip links that are not
   * ready yet, so nothing else would deliver them.
   */
  private async pushHostStateChanges(replayed: HandshakeState): Promise<void> {
    const current = this.options.handshakeState();
    if (current.priorityFiles !== replayed.priorityFiles) {
      await this.pushWhileReady("priorityFiles/set", { files: [...current.priorityFiles] });
    }
    if (current.subscriptions !== replayed.subscriptions) {
      await this.pushWhileReady("subscriptions/set", { subscriptions: { ...current.subscriptions } });
    }
  }

  private async pushWhileReady(method: string, params: JsonObject): Promise<void> {
    if (!this.isReady) {
      return;
    }
    try {
      await this.request(method, params);
      this.logger.debug("link_host_state_synced", { method });
    } catch (error) {
      this.reportInternalError(error);
    }
  }

  private closeQueues(): void {
    this.diagnostics.close();
    this.prints.close();
    this.internalErrors.close();
    this.notifications.close();
  }

  private ensureCompatible(reply: HandshakeResult): void {
    if (reply.isCompatible === false) {
      throw new IncompatiblePluginError(`${this.name} ${reply.version} declared itself incompatible with the host`);
    }
    const range = this.options.pluginVersions;
    if (!isWithinRange(reply.version, range)) {
      throw new IncompatiblePluginError(
        `${this.name} ${reply.version} is outside the supported plugin versions (${formatRange(range)})`,
      );
    }
  }

  private async closeChannel(): Promise<void> {
    const channel = this.channel;
    if (!channel) {
      return;
    }
    try {
      await channel.close();
    } catch (error) {
      this.logger.warn("link_close_failed", { message: describeError(error) });
    }
  }

  /** Routes channel events into the typed queues until the channel closes. */
  private async pump(channel: JsonRpcChannel): Promise<void> {
    for await (const event of channel.events) {
      switch (event.type) {
        case "notification":
          this.route(event.method, event.params);
          break;
        case "error":
          this.reportInternalError(event.error);
          break;
        case "closed":
          if (this.isReady) {
            this.internalErrors.push({ message: `connection to ${this.name} closed`, stackTrace: "" });
          }
          return;
      }
    }
  }

  private route(method: string, params: unknown): void {
    switch (method) {
      case NOTIFICATIONS.diagnosticsChanged: {
        const parsed = DiagnosticsChangedParamsSchema.safeParse(params);
        if (parsed.success) {
          this.diagnostics.push(parsed.data);
        } else {
          this.reportMalformed(method, parsed.error.message);
        }
        return;
      }
      case NOTIFICATIONS.print: {
        const parsed = PrintParamsSchema.safeParse(params);
        if (parsed.success) {
          this.prints.push(parsed.data.message);
        } else {
          this.reportMalformed(method, parsed.error.message);
        }
        return;
      }
      case NOTIFICATIONS.pluginError: {
        const parsed = ChildPluginErrorParamsSchema.safeParse(params);
        if (parsed.success) {
          this.internalErrors.push({ message: parsed.data.message, stackTrace: parsed.data.stackTrace ?? "" });
        } else {
          this.reportMalformed(method, parsed.error.message);
        }
        return;
      }
      default: {
        const body = asJsonObject(params);
        if (body) {
          this.notifications.push({ method, params: body });
        } else {
          this.reportMalformed(method, "params must be an object");
        }
      }
    }
  }

  private reportMalformed(method: string, reason: string): void {
    this.internalErrors.push({ message: `malformed ${method} notification: ${reason}`, stackTrace: "" });
  }

  private reportInternalError(error: unknown): void {
    const captured = failure(error);
    this.internalErrors.push({ message: describeError(captured.error), stackTrace: captured.trace });
  }
}
