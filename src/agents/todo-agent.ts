import type { Agent } from "../agent.js";
import { DEFAULT_TODO_MCP_URL } from "../config.js";
import type { ToolEndpoint } from "../mcp/session.js";
import { TODO_INSTRUCTIONS } from "../prompt/instructions.js";
import { createTodoTools } from "../tools/todo.js";
import { createToolAgent, type ToolAgentDeps } from "./tool-agent.js";

export const TODO_AGENT_NAME = "To-Do Agent";

export function createTodoAgent(
  deps: ToolAgentDeps,
  endpoint: ToolEndpoint = { transport: "http", url: DEFAULT_TODO_MCP_URL },
): Agent {
  return createToolAgent(
    {
      name: TODO_AGENT_NAME,
      instructions: TODO_INSTRUCTIONS,
      serverName: "todo",
      endpoint,
      createTools: createTodoTools,
    },
    deps,
  );
}
