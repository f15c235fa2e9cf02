import type { SessionFactory, ToolEndpoint, ToolServerSession } from "./session.js";

/**
 * Mock tool server for testing.
 *
 * Handlers return a JSON payload which is wrapped the way an MCP server
 * wraps it: `{ content: [{ type: "text", text: JSON.stringify(payload) }] }`.
 * Use {@link MockToolServer.reply} for hand-shaped replies and
 * {@link MockToolServer.failWith} to simulate a transport failure.
 */

export type MockToolHandler = (args: Record<string, unknown>) => unknown;

export interface MockToolCall {
  name: string;
  args: Record<string, unknown>;
}

type Behaviour =
  | { kind: "payload"; handler: MockToolHandler }
  | { kind: "reply"; reply: unknown }
  | { kind: "throw"; error: Error };

export class MockToolServer {
  /** Records all calls for assertion */
  public calls: MockToolCall[] = [];
  public connectCount = 0;
  public closeCount = 0;
  /** When set, the next connect attempts reject with this error */
  public connectError: Error | null = null;

  private behaviours = new Map<string, Behaviour>();
  private resources = new Map<string, unknown>();
  private descriptors: Array<{ name: string; description: string }> = [];

  /** Respond to `name` with a JSON payload computed from the arguments */
  on(name: string, handler: MockToolHandler): this {
    this.behaviours.set(name, { kind: "payload", handler });
    if (!this.descriptors.some((d) => d.name === name)) {
      this.descriptors.push({ name, description: `Mock ${name}` });
    }
    return this;
  }

  /** Respond to `name` with a raw reply object */
  reply(name: string, reply: unknown): this {
    this.behaviours.set(name, { kind: "reply", reply });
    return this;
  }

  /** Make calls to `name` reject, as a broken connection would */
  failWith(name: string, error: Error): this {
    this.behaviours.set(name, { kind: "throw", error });
    return this;
  }

  resource(uri: string, payload: unknown): this {
    this.resources.set(uri, payload);
    return this;
  }

  callsTo(name: string): MockToolCall[] {
    return this.calls.filter((c) => c.name === name);
  }

  /** Session factory to hand to a ToolInvoker */
  readonly factory: SessionFactory = async (_endpoint: ToolEndpoint) => {
    this.connectCount++;
    if (this.connectError) throw this.connectError;
    return this.createSession();
  };

  private createSession(): ToolServerSession {
    return {
      callTool: async (name, args) => {
        this.calls.push({ name, args: { ...args } });
        const behaviour = this.behaviours.get(name);
        if (!behaviour) {
          return textReply({ error: `Unknown tool: ${name}` });
        }
        switch (behaviour.kind) {
          case "throw":
            throw behaviour.error;
          case "reply":
            return behaviour.reply;
          case "payload":
            return textReply(behaviour.handler(args));
        }
      },
      readResource: async (uri) => {
        const payload = this.resources.get(uri);
        if (payload === undefined) throw new Error(`Resource not found: ${uri}`);
        return { contents: [{ uri, mimeType: "application/json", text: JSON.stringify(payload) }] };
      },
      listTools: async () => ({
        tools: this.descriptors.map((d) => ({
          ...d,
          inputSchema: { type: "object", properties: {} },
        })),
      }),
      close: async () => {
        this.closeCount++;
      },
    };
  }
}

export function textReply(payload: unknown): { content: Array<{ type: "text"; text: string }> } {
  return { content: [{ type: "text", text: JSON.stringify(payload) }] };
}
