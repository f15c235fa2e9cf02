import {
  Agent,
  type AgentChatResult,
  type OnStepCallback,
  type OnTransitionCallback,
} from "./agent.js";
import {
  createConversationState,
  type ConversationState,
  type HistoryPolicy,
} from "./conversation.js";
import { AppError, ConfigurationError, fail, toolError, type Result } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { RemoteToolDescriptor, ToolPayload } from "./mcp/invoker.js";
import { createDelegateTool, type SubAgentHandle } from "./tools/delegate.js";
import { ToolRegistry } from "./tools/registry.js";
import type { AgentConfig, LLMProvider } from "./types.js";

/**
 * Router: the master agent.
 *
 * It owns one handle per sub-agent and exposes each as a delegation tool.
 * Its own Agent core decides, through the backend's tool calls, which
 * sub-agent gets a request; the sub-agent's answer is relayed unchanged.
 * Delegation is one level deep.
 */

export type { SubAgentHandle } from "./tools/delegate.js";

export interface SubAgentSpec {
  id: string;
  displayName: string;
  description: string;
  agent: Agent;
}

export interface RouterOptions {
  config: AgentConfig;
  llm: LLMProvider;
  subAgents: SubAgentSpec[];
  historyPolicy?: HistoryPolicy;
  onStep?: OnStepCallback;
  onTransition?: OnTransitionCallback;
  now?: () => Date;
  logger?: Logger;
}

export interface SubAgentTools {
  id: string;
  displayName: string;
  tools: Result<RemoteToolDescriptor[]>;
}

export class Router {
  private readonly handles = new Map<string, SubAgentHandle>();
  private readonly core: Agent;
  private readonly log: Logger;
  private state: ConversationState | undefined;

  constructor(options: RouterOptions) {
    this.log = options.logger ?? createLogger("router");

    for (const spec of options.subAgents) {
      if (this.handles.has(spec.id)) {
        throw new ConfigurationError(`Sub-agent id "${spec.id}" is used twice`, { id: spec.id });
      }
      const nested = spec.agent.delegateTargets();
      if (nested.length > 0) {
        throw new ConfigurationError(
          `Sub-agent "${spec.id}" delegates to ${nested.join(", ")}; ` +
            "only one level of delegation is supported",
          { id: spec.id, delegatesTo: nested },
        );
      }
      this.handles.set(spec.id, { ...spec });
    }

    const registry = new ToolRegistry();
    registry.registerAll([...this.handles.values()].map(createDelegateTool));

    this.core = new Agent({
      config: options.config,
      llm: options.llm,
      registry,
      historyPolicy: options.historyPolicy,
      onStep: options.onStep,
      onTransition: options.onTransition,
      now: options.now,
    });
  }

  get conversation(): ConversationState | undefined {
    return this.state;
  }

  get agent(): Agent {
    return this.core;
  }

  subAgent(id: string): SubAgentHandle | undefined {
    return this.handles.get(id);
  }

  subAgents(): SubAgentHandle[] {
    return [...this.handles.values()];
  }

  /**
   * Start every sub-agent, then the router core. If any start fails, the
   * sub-agents already started are stopped again before the error is rethrown.
   */
  async start(): Promise<void> {
    const started: Agent[] = [];
    try {
      for (const handle of this.handles.values()) {
        await handle.agent.start();
        started.push(handle.agent);
      }
      await this.core.start();
    } catch (err) {
      for (const agent of started.reverse()) {
        await agent.stop();
      }
      throw err;
    }
    this.log.info("Router ready", { subAgents: [...this.handles.keys()] });
  }

  async stop(): Promise<void> {
    await this.core.stop();
    for (const handle of this.handles.values()) {
      await handle.agent.stop();
    }
  }

  /** Handle one user request, continuing the router's conversation */
  async chat(text: string): Promise<AgentChatResult> {
    const state = this.state ?? createConversationState();
    this.state = state;
    return this.core.chat(text, state);
  }

  /** Forget the router's conversation and every sub-agent's */
  reset(): void {
    this.state = undefined;
    for (const handle of this.handles.values()) {
      handle.state = undefined;
    }
    this.log.debug("Conversations reset");
  }

  /** Tools advertised by each sub-agent's tool server */
  async remoteTools(): Promise<SubAgentTools[]> {
    const listings: SubAgentTools[] = [];
    for (const handle of this.handles.values()) {
      const invoker = handle.agent.toolInvoker;
      listings.push({
        id: handle.id,
        displayName: handle.displayName,
        tools: invoker
          ? await invoker.listTools()
          : fail(toolError("transport", `${handle.displayName} has no tool server`)),
      });
    }
    return listings;
  }

  /** Read a resource snapshot (e.g. `gmail://labels`) from a sub-agent's tool server */
  async readResource(subAgentId: string, uri: string): Promise<Result<ToolPayload>> {
    const handle = this.handles.get(subAgentId);
    if (!handle) {
      throw new AppError(`Unknown sub-agent "${subAgentId}"`, "UNKNOWN_SUB_AGENT", true, {
        id: subAgentId,
        known: [...this.handles.keys()],
      });
    }
    const invoker = handle.agent.toolInvoker;
    if (!invoker) return fail(toolError("transport", `${handle.displayName} has no tool server`));
    return invoker.readResource(uri);
  }
}
