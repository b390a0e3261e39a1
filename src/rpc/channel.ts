import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { JSONRPCMessage } from "@modelcontextprotocol/sdk/types.js";

import { MessageQueue } from "../events/stream.js";
import type { StructuredLogger } from "../logger.js";
import { ChannelClosedError, ChildResponseError, MethodNotFoundError, RequestTimeoutError } from "./errors.js";
import {
  classifyMessage,
  encodeError,
  encodeNotification,
  encodeRequest,
  type JsonObject,
  type RequestId,
} from "./messages.js";

/** Default budget granted to a request before it is rejected. */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/**
 * Events surfaced by a channel, in arrival order. `closed` is always the last
 * event of a channel whose transport went away.
 */
export type ChannelEvent =
  | { type: "notification"; method: string; params: unknown }
  | { type: "error"; error: Error }
  | { type: "closed" };

export interface JsonRpcChannelOptions {
  /** Human readable name used in error messages and logs. */
  readonly label: string;
  readonly requestTimeoutMs?: number;
  readonly logger?: StructuredLogger;
}

export interface RequestOptions {
  /** Overrides the channel-wide timeout for this request. */
  readonly timeoutMs?: number;
}

interface PendingRequest {
  readonly method: string;
  readonly resolve: (result: unknown) => void;
  readonly reject: (error: Error) => void;
  readonly timer: NodeJS.Timeout;
}

/**
 * Request/response correlation over an SDK {@link Transport}. Requests get
 * monotonically increasing ids and are rejected on timeout or when the
 * transport closes; notifications and transport errors are queued on
 * {@link events} for a single consumer.
 */
export class JsonRpcChannel {
  readonly events: MessageQueue<ChannelEvent>;

  private readonly label: string;
  private readonly requestTimeoutMs: number;
  private readonly logger?: StructuredLogger;
  private readonly pending = new Map<RequestId, PendingRequest>();
  private nextId = 1;
  private started = false;
  private closed = false;

  constructor(
    private readonly transport: Transport,
    options: JsonRpcChannelOptions,
  ) {
    this.label = options.label;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger;
    this.events = new MessageQueue<ChannelEvent>(`${options.label} events`);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of requests still waiting for a response. */
  get inFlight(): number {
    return this.pending.size;
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;
    this.transport.onmessage = (message) => this.handleMessage(message);
    this.transport.onerror = (error) => {
      this.events.push({ type: "error", error });
    };
    this.transport.onclose = () => this.handleClose();
    await this.transport.start();
  }

  request(method: string, params: JsonObject = {}, options: RequestOptions = {}): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError(this.label));
    }
    const id = this.nextId;
    this.nextId += 1;
    const timeoutMs = options.timeoutMs ?? this.requestTimeoutMs;

    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new RequestTimeoutError(method, timeoutMs, { requestId: id }));
      }, timeoutMs);
      timer.unref();
      this.pending.set(id, { method, resolve, reject, timer });
      this.transport.send(encodeRequest(id, method, params)).catch((error: unknown) => {
        this.settle(id, (entry) => entry.reject(error instanceof Error ? error : new Error(String(error))));
      });
    });
  }

  async notify(method: string, params: JsonObject = {}): Promise<void> {
    if (this.closed) {
      throw new ChannelClosedError(this.label);
    }
    await this.transport.send(encodeNotification(method, params));
  }

  /** Closes the transport. In-flight requests reject with {@link ChannelClosedError}. */
  async close(): Promise<void> {
    if (!this.closed) {
      this.handleClose();
      await this.transport.close();
    }
    this.events.close();
  }

  private handleMessage(raw: JSONRPCMessage): void {
    const message = classifyMessage(raw);
    switch (message.kind) {
      case "result":
        this.settle(message.id, (entry) => entry.resolve(message.result));
        return;
      case "error": {
        const { id, error } = message;
        if (id === null) {
          this.events.push({ type: "error", error: new ChildResponseError(error.message, { code: error.code }) });
          return;
        }
        this.settle(id, (entry) =>
          entry.reject(
            new ChildResponseError(error.message, {
              code: error.code,
              requestId: id,
              meta: { method: entry.method, data: error.data ?? null },
            }),
          ),
        );
        return;
      }
      case "notification":
        this.events.push({ type: "notification", method: message.method, params: message.params });
        return;
      case "request":
        this.rejectIncomingRequest(message.id, message.method);
        return;
      case "invalid":
        this.events.push({ type: "error", error: new Error(`invalid message from ${this.label}: ${message.reason}`) });
        return;
    }
  }

  /** The hub exposes no methods to plugins; every request gets -32601. */
  private rejectIncomingRequest(id: RequestId, method: string): void {
    const error = new MethodNotFoundError(method, { requestId: id });
    this.transport
      .send(encodeError(id, { code: error.code, message: error.message, data: error.data }))
      .catch((cause: unknown) => {
        this.logger?.warn("channel_reply_failed", { channel: this.label, method, error: cause });
      });
  }

  private settle(id: RequestId, apply: (entry: PendingRequest) => void): void {
    const entry = this.pending.get(id);
    if (!entry) {
      this.logger?.debug("channel_unmatched_response", { channel: this.label, id });
      return;
    }
    this.pending.delete(id);
    clearTimeout(entry.timer);
    apply(entry);
  }

  private handleClose(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const entries = [...this.pending.entries()];
    this.pending.clear();
    for (const [id, entry] of entries) {
      clearTimeout(entry.timer);
      entry.reject(new ChannelClosedError(this.label, { requestId: id, meta: { method: entry.method } }));
    }
    this.events.push({ type: "closed" });
  }
}
