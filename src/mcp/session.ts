/**
 * The narrow surface the invoker needs from an MCP connection.
 * Replies are left `unknown`; decoding happens in the invoker.
 */

export type ToolEndpoint =
  | { transport: "http"; url: string }
  | { transport: "stdio"; command: string; args?: string[] };

export interface ToolServerSession {
  callTool(name: string, args: Record<string, unknown>): Promise<unknown>;
  readResource(uri: string): Promise<unknown>;
  listTools(): Promise<unknown>;
  close(): Promise<void>;
}

/** Opens a connected session to an endpoint, or rejects. */
export type SessionFactory = (endpoint: ToolEndpoint) => Promise<ToolServerSession>;

export function describeEndpoint(endpoint: ToolEndpoint): string {
  if (endpoint.transport === "http") return endpoint.url;
  return [endpoint.command, ...(endpoint.args ?? [])].join(" ");
}
