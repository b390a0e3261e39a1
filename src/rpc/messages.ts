import { JSONRPCMessageSchema, type JSONRPCMessage } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

/**
 * JSON-RPC 2.0 framing helpers. Outgoing messages are validated against the
 * SDK schema so a transport never receives a malformed envelope; incoming
 * messages arrive as untrusted values and are classified here before anyone
 * looks at their fields.
 */

export type RequestId = string | number;

/** Parameters and results travel as plain JSON objects. */
export type JsonObject = Record<string, unknown>;

export interface RpcErrorPayload {
  code: number;
  message: string;
  data?: unknown;
}

export type IncomingMessage =
  | { kind: "request"; id: RequestId; method: string; params: unknown }
  | { kind: "notification"; method: string; params: unknown }
  | { kind: "result"; id: RequestId; result: unknown }
  | { kind: "error"; id: RequestId | null; error: RpcErrorPayload }
  | { kind: "invalid"; id: RequestId | null; reason: string };

const RequestIdSchema = z.union([z.string(), z.number().int()]);

const EnvelopeSchema = z
  .object({
    jsonrpc: z.literal("2.0"),
    id: RequestIdSchema.nullable().optional(),
    method: z.string().min(1).optional(),
    params: z.unknown().optional(),
    result: z.unknown().optional(),
    error: z
      .object({ code: z.number().int(), message: z.string(), data: z.unknown().optional() })
      .optional(),
  })
  .passthrough();

export function encodeRequest(id: RequestId, method: string, params: JsonObject = {}): JSONRPCMessage {
  return JSONRPCMessageSchema.parse({ jsonrpc: "2.0", id, method, params });
}

export function encodeNotification(method: string, params: JsonObject = {}): JSONRPCMessage {
  return JSONRPCMessageSchema.parse({ jsonrpc: "2.0", method, params });
}

export function encodeResult(id: RequestId, result: JsonObject): JSONRPCMessage {
  return JSONRPCMessageSchema.parse({ jsonrpc: "2.0", id, result });
}

export function encodeError(id: RequestId, error: RpcErrorPayload): JSONRPCMessage {
  return JSONRPCMessageSchema.parse({ jsonrpc: "2.0", id, error });
}

/** Sorts a raw message into the envelope kind it carries. */
export function classifyMessage(raw: unknown): IncomingMessage {
  const parsed = EnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    return { kind: "invalid", id: null, reason: parsed.error.issues.map((issue) => issue.message).join("; ") };
  }
  const envelope = parsed.data;
  const id = envelope.id ?? null;
  if (envelope.method !== undefined) {
    if (id === null) {
      return { kind: "notification", method: envelope.method, params: envelope.params };
    }
    return { kind: "request", id, method: envelope.method, params: envelope.params };
  }
  if (envelope.error !== undefined) {
    return { kind: "error", id, error: envelope.error };
  }
  if (id !== null && "result" in envelope) {
    return { kind: "result", id, result: envelope.result };
  }
  return { kind: "invalid", id, reason: "message is neither a request, a notification nor a response" };
}

/** Narrows a params value to a JSON object, treating an absent value as `{}`. */
export function asJsonObject(value: unknown): JsonObject | null {
  if (value === undefined || value === null) {
    return {};
  }
  if (typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return null;
}
