import fs from "fs";
import path from "path";
import type { DebugLogSink } from "./types";

const noop: DebugLogSink = () => {};

/**
 * Debug sink for protocol traffic and connection transitions.
 * Disabled: drops everything. With a file: appends timestamped lines.
 * Otherwise: console.debug.
 */
export function createDebugLogSink(options: { enabled: boolean; file?: string }): DebugLogSink {
  if (!options.enabled) return noop;

  if (!options.file) {
    return message => console.debug(`[ProtocolClient] ${message}`);
  }

  const file = path.resolve(options.file);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  const stream = fs.createWriteStream(file, { flags: "a" });
  stream.on("error", error => {
    console.error(`[ProtocolClient] Debug log ${file} is not writable:`, error);
  });

  return message => {
    stream.write(`${new Date().toISOString()} ${message}\n`);
  };
}
