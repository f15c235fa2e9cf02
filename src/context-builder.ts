import type { AgentConfig, ToolDefinition, Turn } from "./types.js";
import { buildSystemPrompt } from "./prompt/system-prompt.js";
import { unboundedHistory, type ConversationState, type HistoryPolicy } from "./conversation.js";
import type { ToolRegistry } from "./tools/registry.js";

/**
 * ContextBuilder: assembles what the backend sees on each reasoning pass.
 *
 *   1. Select: every tool registered for this agent
 *   2. Build : system prompt from config + tools + current context hints
 *   3. Replay: the turns chosen by the history policy
 */

export interface ContextBuildResult {
  systemPrompt: string;
  turns: readonly Turn[];
  tools: ToolDefinition[];
}

export interface ContextBuilderOptions {
  config: AgentConfig;
  registry: ToolRegistry;
  historyPolicy?: HistoryPolicy;
  /** Clock for the runtime section */
  now?: () => Date;
}

export class ContextBuilder {
  private config: AgentConfig;
  private registry: ToolRegistry;
  private historyPolicy: HistoryPolicy;
  private now: () => Date;

  constructor(options: ContextBuilderOptions) {
    this.config = options.config;
    this.registry = options.registry;
    this.historyPolicy = options.historyPolicy ?? unboundedHistory;
    this.now = options.now ?? (() => new Date());
  }

  build(state: ConversationState): ContextBuildResult {
    const tools = this.registry.definitions();
    const systemPrompt = buildSystemPrompt({
      config: this.config,
      tools,
      contextFields: state.contextFields,
      now: this.now(),
    });
    return {
      systemPrompt,
      turns: this.historyPolicy.select(state.history),
      tools,
    };
  }
}
