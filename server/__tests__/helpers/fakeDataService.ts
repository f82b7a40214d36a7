/**
 * In-process stand-in for the data service subprocess. Speaks the same
 * newline-delimited JSON-RPC as the real server through the Transport
 * interface, so ProtocolClient runs unmodified against it.
 */

import { z } from "zod";
import type { Transport, TransportFactory, TransportHandlers } from "../../dataService/types";

export type FakeReply =
  | { result: unknown; delayMs?: number }
  | { error: { code: number; message: string }; delayMs?: number }
  | { hang: true };

export type ToolHandler = (name: string, args: Record<string, unknown>) => FakeReply;

export type HandshakeMode = "ok" | "hang" | "exit";

const sentMessageSchema = z.object({
  id: z.number().int().optional(),
  method: z.string(),
  params: z.record(z.unknown()).optional(),
});

export type SentMessage = z.infer<typeof sentMessageSchema>;

export function toolText(data: unknown): { content: Array<{ type: "text"; text: string }> } {
  return { content: [{ type: "text", text: typeof data === "string" ? data : JSON.stringify(data) }] };
}

export class FakeDataService {
  spawns = 0;
  failSpawn = false;
  handshake: HandshakeMode = "ok";
  sent: SentMessage[] = [];
  toolHandler: ToolHandler = () => ({ result: toolText({ papers: [], count: 0 }) });

  private current: { handlers: TransportHandlers; closed: boolean } | null = null;

  readonly factory: TransportFactory = (handlers: TransportHandlers): Transport => {
    this.spawns++;
    if (this.failSpawn) {
      throw new Error("spawn research-data-service ENOENT");
    }

    const connection = { handlers, closed: false };
    this.current = connection;
    // Real servers log to stdout before they answer
    setTimeout(() => {
      if (!connection.closed) handlers.onLine("INFO data service starting");
    }, 0);

    return {
      send: (line: string) => {
        if (connection.closed) throw new Error("write EPIPE");
        this.receive(connection, line);
      },
      close: async () => {
        connection.closed = true;
      },
    };
  };

  /** Simulates the subprocess dying. */
  exitCurrent(code = 1): void {
    const connection = this.current;
    if (!connection || connection.closed) return;
    connection.closed = true;
    connection.handlers.onExit(code, null);
  }

  toolCallIds(): number[] {
    return this.sent
      .filter(m => m.method === "tools/call" && m.id !== undefined)
      .map(m => m.id ?? 0);
  }

  methods(): string[] {
    return this.sent.map(m => m.method);
  }

  private receive(connection: { handlers: TransportHandlers; closed: boolean }, line: string): void {
    const message = sentMessageSchema.parse(JSON.parse(line));
    this.sent.push(message);
    const id = message.id;
    if (id === undefined) return;

    const reply = (payload: FakeReply) => {
      if ("hang" in payload) return;
      setTimeout(() => {
        if (connection.closed) return;
        const body = "result" in payload ? { result: payload.result } : { error: payload.error };
        connection.handlers.onLine(JSON.stringify({ jsonrpc: "2.0", id, ...body }));
      }, payload.delayMs ?? 0);
    };

    switch (message.method) {
      case "initialize":
        if (this.handshake === "hang") return;
        if (this.handshake === "exit") {
          setTimeout(() => this.exitCurrent(1), 0);
          return;
        }
        reply({
          result: {
            protocolVersion: "2024-11-05",
            capabilities: { tools: {} },
            serverInfo: { name: "fake-data-service", version: "0.0.1" },
          },
        });
        return;
      case "tools/list":
        reply({ result: { tools: [{ name: "search_papers", description: "Search papers" }, { name: "get_top_keywords" }] } });
        return;
      case "tools/call": {
        const name = typeof message.params?.name === "string" ? message.params.name : "";
        const args = z.record(z.unknown()).catch({}).parse(message.params?.arguments);
        reply(this.toolHandler(name, args));
        return;
      }
      default:
        reply({ error: { code: -32601, message: `Method not found: ${message.method}` } });
    }
  }
}
