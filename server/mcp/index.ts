/**
 * MCP Layer
 *
 * Purpose:
 * Entry point for turning an Intent into data service calls.
 *
 * Usage:
 * - new ToolDispatcher(protocolClient).dispatch(intent)
 * - planInvocations(intent) to see which tools an intent would call
 *
 * Layer: MCP (orchestration)
 */

export { ToolDispatcher, type ToolDispatcherOptions } from "./dispatcher";
export { DISPATCH_TABLE } from "./dispatchTable";
export { TOOL_REGISTRY, tools } from "./tools";
export * from "./payloads";
export * from "./types";
