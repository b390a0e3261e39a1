import type { JSONRPCMessage } from "@modelcontextprotocol/sdk/types.js";

import { encodeError, type RequestId } from "./messages.js";

/**
 * Canonical taxonomy describing the JSON-RPC error categories the hub reports,
 * both to the host and when a plugin channel fails. Each entry provides the
 * JSON-RPC error code and the default human-readable message.
 */
export const JSON_RPC_ERROR_TAXONOMY = {
  VALIDATION_ERROR: { code: -32602, message: "Invalid params" },
  METHOD_NOT_FOUND: { code: -32601, message: "Method not found" },
  INTERNAL: { code: -32000, message: "Internal error" },
  TIMEOUT: { code: -32003, message: "Request timeout" },
  CHANNEL_CLOSED: { code: -32004, message: "Channel closed" },
  CHILD_ERROR: { code: -32005, message: "Plugin returned an error" },
} as const;

export type JsonRpcErrorCategory = keyof typeof JSON_RPC_ERROR_TAXONOMY;

/** Metadata attached to every error response under `error.data`. */
export interface JsonRpcErrorData {
  category: JsonRpcErrorCategory;
  request_id?: RequestId | null;
  hint?: string;
  issues?: unknown;
  meta?: Record<string, unknown>;
}

export interface JsonRpcErrorOptions {
  /** Overrides the taxonomy code, used to keep a plugin's own error code. */
  code?: number;
  requestId?: RequestId | null;
  hint?: string;
  issues?: unknown;
  meta?: Record<string, unknown>;
}

function createJsonRpcErrorData(category: JsonRpcErrorCategory, options: JsonRpcErrorOptions): JsonRpcErrorData {
  const snapshot: JsonRpcErrorData = { category };
  if (options.requestId !== undefined) {
    snapshot.request_id = options.requestId;
  }
  if (options.hint !== undefined) {
    snapshot.hint = options.hint;
  }
  if (options.issues !== undefined) {
    snapshot.issues = options.issues;
  }
  if (options.meta !== undefined) {
    snapshot.meta = options.meta;
  }
  return snapshot;
}

/**
 * Base class for the typed JSON-RPC errors. Subclasses fix the category while
 * keeping the options bag for hints and metadata.
 */
export class JsonRpcError extends Error {
  readonly category: JsonRpcErrorCategory;
  readonly code: number;
  readonly data: JsonRpcErrorData;

  constructor(category: JsonRpcErrorCategory, message?: string, options: JsonRpcErrorOptions = {}) {
    const taxonomy = JSON_RPC_ERROR_TAXONOMY[category];
    super(message ?? taxonomy.message);
    this.name = "JsonRpcError";
    this.category = category;
    this.code = options.code ?? taxonomy.code;
    this.data = createJsonRpcErrorData(category, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed host params. */
export class ValidationError extends JsonRpcError {
  constructor(message?: string, options: JsonRpcErrorOptions = {}) {
    super("VALIDATION_ERROR", message, options);
    this.name = "ValidationError";
  }
}

export class MethodNotFoundError extends JsonRpcError {
  constructor(method: string, options: JsonRpcErrorOptions = {}) {
    super("METHOD_NOT_FOUND", `Method not found: ${method}`, options);
    this.name = "MethodNotFoundError";
  }
}

/** Catch-all failure propagated to the host. */
export class InternalError extends JsonRpcError {
  constructor(message?: string, options: JsonRpcErrorOptions = {}) {
    super("INTERNAL", message, options);
    this.name = "InternalError";
  }
}

/** Raised when a plugin does not answer within the request budget. */
export class RequestTimeoutError extends JsonRpcError {
  constructor(method: string, timeoutMs: number, options: JsonRpcErrorOptions = {}) {
    super("TIMEOUT", `Request ${method} timed out after ${timeoutMs}ms`, options);
    this.name = "RequestTimeoutError";
  }
}

/** Rejects requests still in flight when a channel closes. */
export class ChannelClosedError extends JsonRpcError {
  constructor(label: string, options: JsonRpcErrorOptions = {}) {
    super("CHANNEL_CLOSED", `Channel to ${label} closed`, options);
    this.name = "ChannelClosedError";
  }
}

/** Error response sent back by a plugin; keeps the plugin's own code. */
export class ChildResponseError extends JsonRpcError {
  constructor(message: string, options: JsonRpcErrorOptions = {}) {
    super("CHILD_ERROR", message, options);
    this.name = "ChildResponseError";
  }
}

/**
 * Maps any thrown value onto a {@link JsonRpcError}. Typed errors are kept
 * as-is; everything else becomes an {@link InternalError}.
 */
export function asJsonRpcError(cause: unknown, requestId?: RequestId | null): JsonRpcError {
  if (cause instanceof JsonRpcError) {
    return cause;
  }
  const message = cause instanceof Error ? cause.message : String(cause);
  return new InternalError(message, { requestId });
}

/** Formats a {@link JsonRpcError} into a JSON-RPC error response. */
export function toJsonRpc(id: RequestId, error: JsonRpcError): JSONRPCMessage {
  return encodeError(id, { code: error.code, message: error.message, data: error.data });
}
