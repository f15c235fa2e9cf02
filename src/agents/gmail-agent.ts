import type { Agent } from "../agent.js";
import { DEFAULT_GMAIL_MCP_URL } from "../config.js";
import type { ToolEndpoint } from "../mcp/session.js";
import { GMAIL_INSTRUCTIONS } from "../prompt/instructions.js";
import { createGmailTools } from "../tools/gmail.js";
import { createToolAgent, type ToolAgentDeps } from "./tool-agent.js";

export const GMAIL_AGENT_NAME = "Gmail Agent";

export function createGmailAgent(
  deps: ToolAgentDeps,
  endpoint: ToolEndpoint = { transport: "http", url: DEFAULT_GMAIL_MCP_URL },
): Agent {
  return createToolAgent(
    {
      name: GMAIL_AGENT_NAME,
      instructions: GMAIL_INSTRUCTIONS,
      serverName: "gmail",
      endpoint,
      createTools: createGmailTools,
    },
    deps,
  );
}
