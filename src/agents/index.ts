import type { OnStepCallback, OnTransitionCallback } from "../agent.js";
import type { AppConfig } from "../config.js";
import type { SessionFactory } from "../mcp/session.js";
import { ROUTER_INSTRUCTIONS } from "../prompt/instructions.js";
import { Router, type SubAgentSpec } from "../router.js";
import type { LLMProvider } from "../types.js";
import { createGmailAgent, GMAIL_AGENT_NAME } from "./gmail-agent.js";
import { createTodoAgent, TODO_AGENT_NAME } from "./todo-agent.js";
import type { ToolAgentDeps } from "./tool-agent.js";

export { createGmailAgent, GMAIL_AGENT_NAME } from "./gmail-agent.js";
export { createTodoAgent, TODO_AGENT_NAME } from "./todo-agent.js";
export { createToolAgent, type ToolAgentBlueprint, type ToolAgentDeps } from "./tool-agent.js";

export interface AssemblyOptions {
  llm: LLMProvider;
  connect: SessionFactory;
  onStep?: OnStepCallback;
  onTransition?: OnTransitionCallback;
  now?: () => Date;
}

/** Gmail and To-Do sub-agents wired to the configured tool servers */
export function createSubAgents(config: AppConfig, options: AssemblyOptions): SubAgentSpec[] {
  const deps: ToolAgentDeps = {
    llm: options.llm,
    connect: options.connect,
    model: config.llm.model,
    maxRounds: config.agent.maxRounds,
    connectTimeoutMs: config.mcp.connectTimeoutMs,
    requestTimeoutMs: config.mcp.requestTimeoutMs,
    onStep: options.onStep,
    onTransition: options.onTransition,
    now: options.now,
  };

  return [
    {
      id: "gmail",
      displayName: GMAIL_AGENT_NAME,
      description:
        "Handles Gmail: listing, reading, searching, sending and replying to email, " +
        "read/unread state and labels.",
      agent: createGmailAgent(deps, { transport: "http", url: config.mcp.gmailUrl }),
    },
    {
      id: "todo",
      displayName: TODO_AGENT_NAME,
      description:
        "Handles Microsoft To-Do: task lists and tasks, including creating, updating, " +
        "completing and deleting them. Understands lists referred to by name.",
      agent: createTodoAgent(deps, { transport: "http", url: config.mcp.todoUrl }),
    },
  ];
}

export function createRouter(config: AppConfig, options: AssemblyOptions): Router {
  return new Router({
    config: {
      name: "Router",
      baseInstructions: ROUTER_INSTRUCTIONS,
      model: config.llm.model,
      maxRounds: config.agent.maxRounds,
    },
    llm: options.llm,
    subAgents: createSubAgents(config, options),
    onStep: options.onStep,
    onTransition: options.onTransition,
    now: options.now,
  });
}
