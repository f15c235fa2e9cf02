import { Agent, type OnStepCallback, type OnTransitionCallback } from "../agent.js";
import type { HistoryPolicy } from "../conversation.js";
import { ToolInvoker } from "../mcp/invoker.js";
import type { SessionFactory, ToolEndpoint } from "../mcp/session.js";
import { ToolRegistry } from "../tools/registry.js";
import type { LLMProvider, Tool } from "../types.js";

/** What every agent backed by a tool server needs from its environment */
export interface ToolAgentDeps {
  llm: LLMProvider;
  /** Opens tool server sessions; the MCP client in production, a mock in tests */
  connect: SessionFactory;
  model: string;
  maxRounds?: number;
  connectTimeoutMs?: number;
  requestTimeoutMs?: number;
  historyPolicy?: HistoryPolicy;
  onStep?: OnStepCallback;
  onTransition?: OnTransitionCallback;
  now?: () => Date;
}

export interface ToolAgentBlueprint {
  name: string;
  instructions: string;
  /** Label of the invoker in logs */
  serverName: string;
  endpoint: ToolEndpoint;
  createTools: (invoker: ToolInvoker) => Tool[];
}

/** An Agent with its own invoker and a registry of the adapters built on it */
export function createToolAgent(blueprint: ToolAgentBlueprint, deps: ToolAgentDeps): Agent {
  const invoker = new ToolInvoker({
    name: blueprint.serverName,
    endpoint: blueprint.endpoint,
    connect: deps.connect,
    connectTimeoutMs: deps.connectTimeoutMs,
    requestTimeoutMs: deps.requestTimeoutMs,
  });

  const registry = new ToolRegistry();
  registry.registerAll(blueprint.createTools(invoker));

  return new Agent({
    config: {
      name: blueprint.name,
      baseInstructions: blueprint.instructions,
      model: deps.model,
      maxRounds: deps.maxRounds,
    },
    llm: deps.llm,
    registry,
    invoker,
    historyPolicy: deps.historyPolicy,
    onStep: deps.onStep,
    onTransition: deps.onTransition,
    now: deps.now,
  });
}
