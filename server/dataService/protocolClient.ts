/**
 * Data Service Protocol Client
 *
 * Purpose:
 * Owns the long-lived subprocess connection to the academic data service
 * and exposes request(name, args) → ToolResult. Callers never see process
 * lifecycle, reconnects or raw transport failures; every request settles
 * with exactly one terminal ToolResult.
 *
 * Connection state machine:
 *   Disconnected → Connecting → Ready → { Degraded, Closed }
 *   Degraded → Connecting        (after retryDelayMs, automatically)
 *   Connecting → Degraded|Closed (handshake failed; Closed once maxRetries
 *                                 consecutive attempts have failed)
 *   Closed → Disconnected        (explicit reset only)
 *
 * Concurrency:
 * - Requests are multiplexed over one subprocess by JSON-RPC id; a pending
 *   table keyed by id routes each response back to its caller.
 * - Connection transitions run through a single recovery promise, so
 *   concurrent callers that observe a broken connection wait on the same
 *   reconnect instead of spawning their own.
 *
 * Layer: Data Service (transport)
 */

import { randomUUID } from "crypto";
import { DATA_SERVICE_CONSTANTS } from "../config/constants";
import { ProtocolTimeoutError, ToolError, getErrorMessage, logError } from "../utils/errorHandler";
import {
  encodeNotification,
  encodeRequest,
  firstText,
  initializeResultSchema,
  parseLine,
  PROTOCOL_ERROR_CODES,
  toolCallResultSchema,
  toolsListResultSchema,
} from "./jsonRpc";
import type {
  ConnectionState,
  DebugLogSink,
  ProtocolClientHealth,
  ProtocolClientOptions,
  RequestOptions,
  ToolDescriptor,
  ToolErrorKind,
  ToolResult,
  Transport,
} from "./types";

type RpcOutcome =
  | { kind: "result"; result: unknown }
  | { kind: "rpc_error"; code: number; message: string }
  | { kind: "timeout"; timeoutMs: number }
  | { kind: "transport"; message: string };

type PendingRequest = {
  method: string;
  timer: NodeJS.Timeout;
  settle: (outcome: RpcOutcome) => void;
};

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function truncate(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

export class ProtocolClient {
  private state: ConnectionState = "Disconnected";
  private transport: Transport | null = null;
  // Bumped whenever a transport is created or released; events from older transports are ignored
  private generation = 0;
  private recovery: Promise<void> | null = null;

  private readonly pending = new Map<number, PendingRequest>();
  private lastCorrelationId = 0;
  private readonly correlationIdLimit: number;

  private consecutiveFailures = 0;
  private consecutiveTimeouts = 0;
  private tools: ToolDescriptor[] = [];
  private spawnCount = 0;

  private readonly debug: DebugLogSink;

  constructor(private readonly options: ProtocolClientOptions) {
    this.debug = options.debugLog ?? (() => {});
    this.correlationIdLimit = options.correlationIdLimit ?? Number.MAX_SAFE_INTEGER;
  }

  getState(): ConnectionState {
    return this.state;
  }

  /** Subprocesses spawned over the client's lifetime. */
  getSpawnCount(): number {
    return this.spawnCount;
  }

  getAvailableTools(): ToolDescriptor[] {
    return [...this.tools];
  }

  health(): ProtocolClientHealth {
    return {
      state: this.state,
      toolsCount: this.tools.length,
      tools: this.tools.map(t => t.name),
      consecutiveFailures: this.consecutiveFailures,
      pendingRequests: this.pending.size,
    };
  }

  /**
   * Connect eagerly instead of on first request. Resolves with the state
   * the connection settled in (Ready or Closed).
   */
  async start(): Promise<ConnectionState> {
    if (this.state === "Disconnected" || this.state === "Degraded" || this.state === "Connecting") {
      await this.recover();
    }
    return this.state;
  }

  /**
   * Issues one tool call. A call lost to a broken connection is re-issued
   * once the connection recovers, up to `maxRetries` attempts; it fails only
   * when the client ends up Closed or the attempts run out.
   */
  async request(
    name: string,
    args: Record<string, unknown>,
    options: RequestOptions = {},
  ): Promise<ToolResult> {
    const correlationId = options.correlationId ?? randomUUID();
    const timeoutMs = options.timeoutMs ?? this.options.callTimeoutMs;
    const maxAttempts = Math.max(this.options.maxRetries, 1);

    for (let attempt = 1; ; attempt++) {
      if (this.state === "Closed") {
        return this.failure(correlationId, name, "closed", "Data service connection is closed");
      }

      if (this.state !== "Ready") {
        await this.recover();
        const settled = this.getState();
        if (settled !== "Ready") {
          const kind: ToolErrorKind = settled === "Closed" ? "closed" : "transport";
          return this.failure(correlationId, name, kind, "Data service is unavailable");
        }
      }

      // Bounds memory held by in-flight calls; stdin buffering is bounded by the same count
      if (this.pending.size >= this.correlationIdLimit) {
        return this.failure(correlationId, name, "transport", "Too many requests in flight");
      }

      this.debug(
        `tools/call ${name} correlation=${correlationId} attempt=${attempt}/${maxAttempts} ` +
        `args=${truncate(JSON.stringify(args))}`,
      );
      const outcome = await this.call("tools/call", { name, arguments: args }, timeoutMs);

      if (outcome.kind !== "transport") {
        return this.toToolResult(correlationId, name, outcome);
      }

      // send() can fail before the exit event reports the broken pipe
      this.markDegraded(outcome.message);
      if (attempt >= maxAttempts) {
        return this.failure(correlationId, name, "transport", outcome.message);
      }
      this.debug(`${name} lost to a broken connection, re-issuing after recovery`);
    }
  }

  private toToolResult(
    correlationId: string,
    name: string,
    outcome: Exclude<RpcOutcome, { kind: "transport" }>,
  ): ToolResult {
    switch (outcome.kind) {
      case "result": {
        this.consecutiveTimeouts = 0;
        const parsed = toolCallResultSchema.safeParse(outcome.result);
        if (!parsed.success) {
          return this.failure(correlationId, name, "protocol", "Data service returned a malformed tool result");
        }
        if (parsed.data.isError) {
          return this.failure(correlationId, name, "tool", firstText(parsed.data) ?? "Tool reported an error");
        }
        return { correlationId, toolName: name, status: "ok", payload: parsed.data };
      }
      case "rpc_error": {
        this.consecutiveTimeouts = 0;
        const kind: ToolErrorKind = PROTOCOL_ERROR_CODES.has(outcome.code) ? "protocol" : "tool";
        return this.failure(correlationId, name, kind, outcome.message);
      }
      case "timeout":
        this.recordTimeout(name, outcome.timeoutMs);
        return {
          correlationId,
          toolName: name,
          status: "timeout",
          errorDetail: { kind: "transport", message: new ProtocolTimeoutError(name, outcome.timeoutMs).message },
        };
      default: {
        const _exhaustive: never = outcome;
        throw new Error(`Unhandled outcome: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  /**
   * Explicit shutdown. Pending requests settle with a `closed` error and
   * the subprocess is released.
   */
  async shutdown(): Promise<void> {
    if (this.state !== "Closed") {
      this.transition("Closed", "shutdown requested");
    }
    this.failPending("Data service client shut down");
    await this.releaseTransport();
  }

  /**
   * Leave Closed so the next request spawns a fresh subprocess.
   */
  reset(): void {
    if (this.state !== "Closed") return;
    this.consecutiveFailures = 0;
    this.consecutiveTimeouts = 0;
    this.transition("Disconnected", "reset requested");
  }

  // ==========================================================================
  // Connection lifecycle
  // ==========================================================================

  private transition(next: ConnectionState, reason: string): void {
    const previous = this.state;
    this.state = next;
    this.debug(`state ${previous} → ${next}: ${reason}`);
    if (next === "Ready" || next === "Degraded" || next === "Closed") {
      console.log(`[ProtocolClient] ${previous} → ${next} (${reason})`);
    }
  }

  /**
   * Single-flight: every caller awaits the same recovery run.
   */
  private recover(): Promise<void> {
    if (!this.recovery) {
      this.recovery = this.driveConnection().finally(() => {
        this.recovery = null;
      });
    }
    return this.recovery;
  }

  private async driveConnection(): Promise<void> {
    for (;;) {
      switch (this.state) {
        case "Ready":
        case "Closed":
        case "Connecting":
          return;
        case "Disconnected":
          await this.connectOnce();
          break;
        case "Degraded":
          this.debug(
            `reconnect in ${this.options.retryDelayMs}ms ` +
            `(failed attempts ${this.consecutiveFailures}/${this.options.maxRetries})`,
          );
          await sleep(this.options.retryDelayMs);
          // shutdown() may have closed the client while we waited
          if (this.getState() === "Degraded") {
            await this.connectOnce();
          }
          break;
      }
    }
  }

  private scheduleReconnect(): void {
    this.recover().catch(error => logError("ProtocolClient", error));
  }

  private async connectOnce(): Promise<void> {
    this.transition("Connecting", `attempt ${this.consecutiveFailures + 1}/${this.options.maxRetries}`);
    const generation = ++this.generation;
    this.spawnCount++;

    try {
      this.transport = this.options.transportFactory({
        onLine: line => this.handleLine(generation, line),
        onExit: (code, signal) => this.handleExit(generation, code, signal),
        onError: error => this.handleTransportError(generation, error),
        onStderr: chunk => this.debug(`stderr: ${truncate(chunk.trimEnd(), 500)}`),
      });
    } catch (error) {
      this.transport = null;
      this.connectFailed(`spawn failed: ${getErrorMessage(error)}`);
      return;
    }

    const failureReason = await this.handshake();

    // Shut down while the handshake was in flight
    if (this.state !== "Connecting") return;

    if (failureReason) {
      await this.releaseTransport();
      this.connectFailed(failureReason);
      return;
    }

    this.consecutiveFailures = 0;
    this.consecutiveTimeouts = 0;
    this.transition("Ready", `handshake complete, ${this.tools.length} tools available`);
  }

  /**
   * initialize → notifications/initialized → tools/list, all inside the
   * startup deadline. Returns a failure reason, or null on success.
   */
  private async handshake(): Promise<string | null> {
    const deadline = Date.now() + this.options.startupTimeoutMs;

    const init = await this.call("initialize", {
      protocolVersion: DATA_SERVICE_CONSTANTS.PROTOCOL_VERSION,
      capabilities: { tools: {} },
      clientInfo: { ...DATA_SERVICE_CONSTANTS.CLIENT_INFO },
    }, this.options.startupTimeoutMs);

    if (init.kind === "timeout") return `handshake timed out after ${init.timeoutMs}ms`;
    if (init.kind === "transport") return `handshake failed: ${init.message}`;
    if (init.kind === "rpc_error") return `initialize rejected: ${init.message}`;

    const server = initializeResultSchema.safeParse(init.result);
    if (!server.success) return "initialize returned a malformed result";
    this.debug(`initialized, server protocol ${server.data.protocolVersion ?? "unknown"}`);

    try {
      this.transport?.send(encodeNotification("notifications/initialized"));
    } catch (error) {
      return `handshake failed: ${getErrorMessage(error)}`;
    }

    // An empty tool list is tolerated; tools/call still works by name
    const remaining = Math.max(deadline - Date.now(), 1);
    const listed = await this.call("tools/list", {}, remaining);
    if (listed.kind === "transport") return `handshake failed: ${listed.message}`;
    if (listed.kind === "result") {
      const parsed = toolsListResultSchema.safeParse(listed.result);
      this.tools = parsed.success
        ? parsed.data.tools.map(t => ({ name: t.name, description: t.description }))
        : [];
    } else {
      console.warn(`[ProtocolClient] tools/list failed (${listed.kind}), continuing with an empty tool list`);
      this.tools = [];
    }
    return null;
  }

  private connectFailed(reason: string): void {
    this.consecutiveFailures++;
    if (this.consecutiveFailures >= this.options.maxRetries) {
      this.transition("Closed", `${reason}; giving up after ${this.consecutiveFailures} consecutive failures`);
      this.failPending("Data service connection is closed");
      return;
    }
    this.transition("Degraded", reason);
  }

  /**
   * Ready → Degraded: tear down the broken connection and reconnect in the
   * background.
   */
  private markDegraded(reason: string): void {
    if (this.state !== "Ready") return;
    this.transition("Degraded", reason);
    this.failPending(`Data service connection lost: ${reason}`);
    this.releaseTransport().catch(error => logError("ProtocolClient", error));
    this.scheduleReconnect();
  }

  private async releaseTransport(): Promise<void> {
    const transport = this.transport;
    this.transport = null;
    this.generation++;
    if (!transport) return;
    try {
      await transport.close();
    } catch (error) {
      console.warn(`[ProtocolClient] Error while closing transport: ${getErrorMessage(error)}`);
    }
  }

  private recordTimeout(name: string, timeoutMs: number): void {
    this.consecutiveTimeouts++;
    this.debug(
      `${name} timed out after ${timeoutMs}ms ` +
      `(${this.consecutiveTimeouts}/${this.options.maxConsecutiveTimeouts} consecutive)`,
    );
    if (this.consecutiveTimeouts >= this.options.maxConsecutiveTimeouts) {
      this.consecutiveTimeouts = 0;
      this.markDegraded(`${this.options.maxConsecutiveTimeouts} consecutive timeouts`);
    }
  }

  // ==========================================================================
  // Transport events
  // ==========================================================================

  private handleLine(generation: number, line: string): void {
    if (generation !== this.generation) return;

    const message = parseLine(line);
    switch (message.kind) {
      case "noise":
        if (line.trim()) this.debug(`stdout: ${truncate(line)}`);
        return;
      case "notification":
        this.debug(`notification ${message.method}`);
        return;
      case "response": {
        const id = typeof message.id === "number" ? message.id : Number(message.id);
        const entry = Number.isInteger(id) ? this.pending.get(id) : undefined;
        if (!entry) {
          this.debug(`dropping response for unknown or expired id ${String(message.id)}`);
          return;
        }
        this.pending.delete(id);
        clearTimeout(entry.timer);
        entry.settle(message.error
          ? { kind: "rpc_error", code: message.error.code, message: message.error.message }
          : { kind: "result", result: message.result });
        return;
      }
    }
  }

  private handleExit(generation: number, code: number | null, signal: NodeJS.Signals | null): void {
    if (generation !== this.generation) return;
    const reason = `process exited (code=${code ?? "null"}, signal=${signal ?? "none"})`;
    this.debug(reason);
    this.onBrokenTransport(reason);
  }

  private handleTransportError(generation: number, error: Error): void {
    if (generation !== this.generation) return;
    const reason = `transport error: ${error.message}`;
    this.debug(reason);
    this.onBrokenTransport(reason);
  }

  private onBrokenTransport(reason: string): void {
    if (this.state === "Ready") {
      this.markDegraded(reason);
    } else if (this.state === "Connecting") {
      // Fails the in-flight handshake call; connectOnce handles the transition
      this.failPending(reason);
    }
  }

  // ==========================================================================
  // Request/response plumbing
  // ==========================================================================

  private nextCorrelationId(): number {
    do {
      this.lastCorrelationId = this.lastCorrelationId >= this.correlationIdLimit
        ? 1
        : this.lastCorrelationId + 1;
    } while (this.pending.has(this.lastCorrelationId));
    return this.lastCorrelationId;
  }

  private call(method: string, params: Record<string, unknown>, timeoutMs: number): Promise<RpcOutcome> {
    const transport = this.transport;
    if (!transport) {
      return Promise.resolve({ kind: "transport", message: "Data service is not connected" });
    }
    if (this.pending.size >= this.correlationIdLimit) {
      return Promise.resolve({ kind: "transport", message: "Too many requests in flight" });
    }

    const id = this.nextCorrelationId();

    return new Promise<RpcOutcome>(resolve => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        resolve({ kind: "timeout", timeoutMs });
      }, timeoutMs);

      this.pending.set(id, { method, timer, settle: resolve });

      try {
        transport.send(encodeRequest(id, method, params));
      } catch (error) {
        clearTimeout(timer);
        this.pending.delete(id);
        resolve({ kind: "transport", message: getErrorMessage(error) });
      }
    });
  }

  private failPending(message: string): void {
    const entries = [...this.pending.entries()];
    this.pending.clear();
    for (const [id, entry] of entries) {
      clearTimeout(entry.timer);
      this.debug(`failing pending ${entry.method} id=${id}: ${message}`);
      entry.settle({ kind: "transport", message });
    }
  }

  private failure(
    correlationId: string,
    toolName: string,
    kind: ToolErrorKind,
    message: string,
  ): ToolResult {
    if (kind === "tool") {
      console.warn(`[ProtocolClient] ${new ToolError(toolName, message).message}`);
    }
    return { correlationId, toolName, status: "error", errorDetail: { kind, message } };
  }
}
