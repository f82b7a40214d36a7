import type { z } from "zod";
import type { toolCallResultSchema } from "./jsonRpc";

// Lifecycle of the single subprocess connection owned by a ProtocolClient
export type ConnectionState =
  | "Disconnected"
  | "Connecting"
  | "Ready"
  | "Degraded"
  | "Closed";

export type ToolCallPayload = z.infer<typeof toolCallResultSchema>;

export type ToolErrorKind =
  | "transport"          // subprocess unreachable, broken pipe, exited
  | "protocol"           // malformed exchange with the data service
  | "tool"               // the tool itself reported a failure
  | "closed"             // client gave up reconnecting or was shut down
  | "dependency"         // an earlier invocation did not resolve this call's input
  | "invalid_arguments"; // arguments rejected before the call was issued

export type ToolErrorDetail = {
  kind: ToolErrorKind;
  message: string;
};

/**
 * Terminal outcome of one tool invocation. Exactly one per invocation.
 */
export type ToolResult =
  | { correlationId: string; toolName: string; status: "ok"; payload: ToolCallPayload }
  | { correlationId: string; toolName: string; status: "error"; errorDetail: ToolErrorDetail }
  | { correlationId: string; toolName: string; status: "timeout"; errorDetail: ToolErrorDetail };

export type ToolDescriptor = {
  name: string;
  description?: string;
};

export type TransportHandlers = {
  onLine(line: string): void;
  onExit(code: number | null, signal: NodeJS.Signals | null): void;
  onError(error: Error): void;
  onStderr?(chunk: string): void;
};

/**
 * A live, line-framed duplex channel to the data service.
 * `send` throws when the channel can no longer be written to.
 */
export interface Transport {
  send(line: string): void;
  close(): Promise<void>;
}

export type TransportFactory = (handlers: TransportHandlers) => Transport;

export type DebugLogSink = (message: string) => void;

export type ProtocolClientOptions = {
  transportFactory: TransportFactory;
  startupTimeoutMs: number;
  callTimeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  maxConsecutiveTimeouts: number;
  debugLog?: DebugLogSink;
  /** Highest correlation id before the counter wraps back to 1. */
  correlationIdLimit?: number;
};

export type RequestOptions = {
  timeoutMs?: number;
  correlationId?: string;
};

export type ProtocolClientHealth = {
  state: ConnectionState;
  toolsCount: number;
  tools: string[];
  consecutiveFailures: number;
  pendingRequests: number;
};
