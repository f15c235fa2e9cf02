import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { SessionFactory, ToolEndpoint } from "./session.js";

export interface SdkSessionOptions {
  clientName: string;
  clientVersion: string;
  /** Per-request timeout handed to the SDK */
  requestTimeoutMs?: number;
}

function createTransport(endpoint: ToolEndpoint) {
  if (endpoint.transport === "http") {
    return new StreamableHTTPClientTransport(new URL(endpoint.url));
  }
  return new StdioClientTransport({
    command: endpoint.command,
    args: endpoint.args ?? [],
  });
}

/**
 * Session factory backed by the official MCP client.
 * Streamable HTTP for `http` endpoints, a spawned subprocess for `stdio`.
 */
export function createSdkSessionFactory(options: SdkSessionOptions): SessionFactory {
  const requestOptions =
    options.requestTimeoutMs !== undefined ? { timeout: options.requestTimeoutMs } : undefined;

  return async (endpoint) => {
    const client = new Client({
      name: options.clientName,
      version: options.clientVersion,
    });
    await client.connect(createTransport(endpoint));

    return {
      callTool: (name, args) =>
        client.callTool({ name, arguments: args }, undefined, requestOptions),
      readResource: (uri) => client.readResource({ uri }, requestOptions),
      listTools: () => client.listTools(undefined, requestOptions),
      close: () => client.close(),
    };
  };
}
