/**
 * Data Service Module
 *
 * Public surface for talking to the academic data service subprocess.
 */

import type { Settings } from "../config/settings";
import { createDebugLogSink } from "./debugLog";
import { ProtocolClient } from "./protocolClient";
import { createStdioTransportFactory } from "./stdioTransport";

export { ProtocolClient } from "./protocolClient";
export { createStdioTransportFactory } from "./stdioTransport";
export { createDebugLogSink } from "./debugLog";
export type {
  ConnectionState,
  ProtocolClientHealth,
  ToolCallPayload,
  ToolErrorDetail,
  ToolErrorKind,
  ToolResult,
  Transport,
  TransportFactory,
  TransportHandlers,
} from "./types";

export function createProtocolClient(settings: Settings["dataService"]): ProtocolClient {
  return new ProtocolClient({
    transportFactory: createStdioTransportFactory({
      command: settings.command,
      args: settings.args,
      cwd: settings.cwd,
    }),
    startupTimeoutMs: settings.startupTimeoutMs,
    callTimeoutMs: settings.callTimeoutMs,
    maxRetries: settings.maxRetries,
    retryDelayMs: settings.retryDelayMs,
    maxConsecutiveTimeouts: settings.maxConsecutiveTimeouts,
    debugLog: createDebugLogSink({ enabled: settings.debugLog, file: settings.debugLogFile }),
  });
}
