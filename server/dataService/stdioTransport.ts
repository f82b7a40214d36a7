/**
 * Subprocess transport for the data service.
 *
 * Spawns the configured command and exposes its stdin/stdout as a
 * line-framed channel. Process lifecycle events are forwarded to the
 * owning ProtocolClient, which decides what they mean for connection state.
 */

import { spawn } from "child_process";
import { createInterface } from "readline";
import { TransportError } from "../utils/errorHandler";
import { DATA_SERVICE_CONSTANTS } from "../config/constants";
import type { Transport, TransportFactory, TransportHandlers } from "./types";

export type StdioTransportConfig = {
  command: string;
  args: string[];
  cwd: string;
  env?: NodeJS.ProcessEnv;
  shutdownGraceMs?: number;
};

export function createStdioTransportFactory(config: StdioTransportConfig): TransportFactory {
  const graceMs = config.shutdownGraceMs ?? DATA_SERVICE_CONSTANTS.SHUTDOWN_GRACE_MS;

  return (handlers: TransportHandlers): Transport => {
    const child = spawn(config.command, config.args, {
      cwd: config.cwd,
      env: config.env ?? process.env,
      stdio: ["pipe", "pipe", "pipe"],
    });

    let exited = false;
    let backedUp = false;
    const exitPromise = new Promise<void>(resolve => {
      child.once("exit", () => {
        exited = true;
        resolve();
      });
      // A failed spawn emits "error" and may never emit "exit"
      child.once("error", () => {
        exited = true;
        resolve();
      });
    });

    const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
    lines.on("line", line => handlers.onLine(line));

    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk: string) => handlers.onStderr?.(chunk));

    child.on("error", error => handlers.onError(error));
    // EPIPE and friends surface here when the process dies mid-write
    child.stdin.on("error", error => handlers.onError(error));
    child.on("exit", (code, signal) => handlers.onExit(code, signal));

    return {
      send(line: string): void {
        if (exited || !child.stdin.writable) {
          throw new TransportError("Data service stdin is not writable");
        }
        // Node buffers writes past the high-water mark; the client's in-flight
        // limit caps how many requests can be queued behind a stalled reader
        if (!child.stdin.write(`${line}\n`) && !backedUp) {
          backedUp = true;
          console.warn(`[StdioTransport] Process ${child.pid} is not draining stdin, buffering requests`);
          child.stdin.once("drain", () => {
            backedUp = false;
          });
        }
      },

      async close(): Promise<void> {
        lines.close();
        if (exited) return;

        child.stdin.end();
        const timedOut = await Promise.race([
          exitPromise.then(() => false),
          new Promise<boolean>(resolve => setTimeout(() => resolve(true), graceMs).unref()),
        ]);

        if (timedOut && !exited) {
          console.warn(`[StdioTransport] Process ${child.pid} did not exit within ${graceMs}ms, killing`);
          child.kill("SIGKILL");
          await exitPromise;
        }
      },
    };
  };
}
