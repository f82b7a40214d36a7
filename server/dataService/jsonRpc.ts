/**
 * JSON-RPC 2.0 framing for the data service.
 *
 * One message per line on stdin/stdout. The data service also prints log
 * lines to stdout, so anything that is not a JSON-RPC message is reported
 * as noise rather than treated as a protocol error.
 */

import { z } from "zod";

const rpcIdSchema = z.union([z.number().int(), z.string()]);

const rpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const rpcResponseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: rpcIdSchema.nullable(),
  result: z.unknown().optional(),
  error: rpcErrorSchema.optional(),
});

const rpcNotificationSchema = z.object({
  jsonrpc: z.literal("2.0"),
  method: z.string(),
  params: z.unknown().optional(),
});

const contentItemSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
}).passthrough();

// MCP tools/call result
export const toolCallResultSchema = z.object({
  content: z.array(contentItemSchema).default([]),
  isError: z.boolean().optional(),
}).passthrough();

export const toolsListResultSchema = z.object({
  tools: z.array(z.object({
    name: z.string(),
    description: z.string().optional(),
  }).passthrough()).default([]),
});

export const initializeResultSchema = z.object({
  protocolVersion: z.string().optional(),
  capabilities: z.record(z.unknown()).optional(),
  serverInfo: z.object({ name: z.string(), version: z.string().optional() }).partial().optional(),
}).passthrough();

// Standard JSON-RPC codes that mean the exchange itself was malformed
export const PROTOCOL_ERROR_CODES: ReadonlySet<number> = new Set([-32700, -32600]);

export type RpcError = z.infer<typeof rpcErrorSchema>;

export type IncomingMessage =
  | { kind: "response"; id: number | string | null; result: unknown; error?: RpcError }
  | { kind: "notification"; method: string }
  | { kind: "noise"; line: string };

export function encodeRequest(id: number, method: string, params: Record<string, unknown> = {}): string {
  return JSON.stringify({ jsonrpc: "2.0", id, method, params });
}

export function encodeNotification(method: string, params: Record<string, unknown> = {}): string {
  return JSON.stringify({ jsonrpc: "2.0", method, params });
}

export function parseLine(line: string): IncomingMessage {
  const trimmed = line.trim();
  if (!trimmed.startsWith("{")) {
    return { kind: "noise", line };
  }

  let data: unknown;
  try {
    data = JSON.parse(trimmed);
  } catch {
    return { kind: "noise", line };
  }

  const response = rpcResponseSchema.safeParse(data);
  if (response.success && (response.data.result !== undefined || response.data.error !== undefined)) {
    return {
      kind: "response",
      id: response.data.id,
      result: response.data.result,
      error: response.data.error,
    };
  }

  const notification = rpcNotificationSchema.safeParse(data);
  if (notification.success) {
    return { kind: "notification", method: notification.data.method };
  }

  return { kind: "noise", line };
}

/**
 * First text block of a tools/call result, used as the failure message when
 * the tool reports `isError`.
 */
export function firstText(payload: z.infer<typeof toolCallResultSchema>): string | undefined {
  for (const item of payload.content) {
    if (item.type === "text" && item.text) return item.text;
  }
  return undefined;
}
