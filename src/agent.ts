import type { AgentConfig, LLMProvider, ToolCall } from "./types.js";
import { ContextBuilder } from "./context-builder.js";
import {
  appendTurn,
  createConversationState,
  updateContext,
  type ConversationState,
  type HistoryPolicy,
} from "./conversation.js";
import {
  AgentNotStartedError,
  AppError,
  InitializationError,
  errorMessage,
  type ToolErrorKind,
} from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { ToolInvoker } from "./mcp/invoker.js";
import type { ToolExecution, ToolRegistry } from "./tools/registry.js";

/**
 * Agent: the turn-taking state machine.
 *
 *   idle → awaiting_input → reasoning → (executing_tools → reasoning)* → done → awaiting_input
 *
 * Each user message:
 *   1. ContextBuilder assembles the system prompt and the history to replay
 *   2. LLM answers with text and/or tool calls
 *   3. Tool calls run one after another, in the order requested; every
 *      result (errors included) is appended under its call id, then loop
 *   4. Text only: that text is the answer
 *   5. Safety: after maxRounds the LLM must answer without tools
 */

export type AgentPhase =
  | "idle"
  | "awaiting_input"
  | "reasoning"
  | "executing_tools"
  | "done";

export interface AgentChatResult {
  /** Final text response from the agent */
  response: string;
  /** The conversation, including this exchange */
  state: ConversationState;
  /** Number of tool rounds used */
  rounds: number;
}

export interface ToolResultSummary {
  callId: string;
  name: string;
  result: string;
  error?: ToolErrorKind;
}

/** Callback fired after each tool round, useful for logging/debugging */
export type OnStepCallback = (step: {
  agent: string;
  round: number;
  toolCalls: ToolCall[];
  toolResults: ToolResultSummary[];
  thinking: string | null;
}) => void;

export type OnTransitionCallback = (from: AgentPhase, to: AgentPhase) => void;

export interface AgentOptions {
  config: AgentConfig;
  llm: LLMProvider;
  registry: ToolRegistry;
  /** Connection owned by this agent; opened by start(), closed by stop() */
  invoker?: ToolInvoker;
  historyPolicy?: HistoryPolicy;
  onStep?: OnStepCallback;
  onTransition?: OnTransitionCallback;
  now?: () => Date;
  logger?: Logger;
}

const DEFAULT_MAX_ROUNDS = 10;

export const FALLBACK_ANSWER = "I've reached the maximum number of reasoning steps.";

const FINAL_STEP_NOTICE =
  "\n\n[FINAL STEP: You CANNOT call any tools. " +
  "Based on ALL the information gathered so far, answer the user NOW.]";

export class Agent {
  private config: AgentConfig;
  private llm: LLMProvider;
  private registry: ToolRegistry;
  private invoker?: ToolInvoker;
  private contextBuilder: ContextBuilder;
  private onStep?: OnStepCallback;
  private onTransition?: OnTransitionCallback;
  private log: Logger;
  private currentPhase: AgentPhase = "idle";
  private busy = false;

  constructor(options: AgentOptions) {
    this.config = options.config;
    this.llm = options.llm;
    this.registry = options.registry;
    this.invoker = options.invoker;
    this.onStep = options.onStep;
    this.onTransition = options.onTransition;
    this.log = options.logger ?? createLogger(`agent:${options.config.name}`);
    this.contextBuilder = new ContextBuilder({
      config: options.config,
      registry: options.registry,
      historyPolicy: options.historyPolicy,
      now: options.now,
    });
  }

  get name(): string {
    return this.config.name;
  }

  get phase(): AgentPhase {
    return this.currentPhase;
  }

  get toolInvoker(): ToolInvoker | undefined {
    return this.invoker;
  }

  /** Names of sub-agents this agent delegates to through its tools */
  delegateTargets(): string[] {
    return this.registry
      .list()
      .map((t) => t.delegatesTo)
      .filter((id): id is string => id !== undefined);
  }

  /**
   * Open the tool server connection. Until this succeeds the agent stays
   * idle and refuses to chat.
   */
  async start(): Promise<void> {
    if (this.currentPhase !== "idle") return;

    if (this.invoker) {
      const invoker = this.invoker;
      try {
        await invoker.connect();
      } catch (err) {
        const message = errorMessage(err);
        throw new InitializationError(
          `${this.config.name} could not reach its tool server at ${invoker.location}: ${message}`,
          remediationHint(message, invoker.location),
          { agent: this.config.name, endpoint: invoker.location },
        );
      }
    }

    this.transition("awaiting_input");
    this.log.info("Ready", { tools: this.registry.size });
  }

  /** Release the tool server connection. */
  async stop(): Promise<void> {
    await this.invoker?.close();
    if (this.currentPhase !== "idle") this.transition("idle");
  }

  /** Run the agent on a user message, continuing `state` when given */
  async chat(text: string, state?: ConversationState): Promise<AgentChatResult> {
    if (this.currentPhase === "idle") throw new AgentNotStartedError(this.config.name);
    if (this.busy) {
      throw new AppError(`${this.config.name} is already handling a message`, "BUSY", true);
    }

    const conversation = state ?? createConversationState();
    appendTurn(conversation, { role: "user", content: text });

    this.busy = true;
    try {
      return await this.runRounds(conversation);
    } finally {
      this.busy = false;
      this.transition("awaiting_input");
    }
  }

  private async runRounds(conversation: ConversationState): Promise<AgentChatResult> {
    const maxRounds = this.config.maxRounds ?? DEFAULT_MAX_ROUNDS;
    let rounds = 0;

    while (true) {
      this.transition("reasoning");
      const ctx = this.contextBuilder.build(conversation);
      const forceAnswer = rounds >= maxRounds;

      const response = await this.llm.chat(
        forceAnswer ? ctx.systemPrompt + FINAL_STEP_NOTICE : ctx.systemPrompt,
        ctx.turns,
        forceAnswer ? [] : ctx.tools,
      );

      if (response.toolCalls.length === 0 || forceAnswer) {
        if (forceAnswer && response.toolCalls.length > 0) {
          this.log.warn("Ignoring tool calls after round limit", { rounds });
        }
        const answer = response.content ?? (forceAnswer ? FALLBACK_ANSWER : "");
        return this.finish(conversation, answer, rounds);
      }

      appendTurn(conversation, {
        role: "assistant",
        content: response.content,
        toolCalls: response.toolCalls,
      });

      this.transition("executing_tools");
      rounds++;
      const executions = await this.executeRound(conversation, response.toolCalls);

      this.onStep?.({
        agent: this.config.name,
        round: rounds,
        toolCalls: response.toolCalls,
        toolResults: executions.map(({ call, execution }) => ({
          callId: call.id,
          name: call.name,
          result: execution.content,
          error: execution.error?.kind,
        })),
        thinking: response.content,
      });

      const direct = executions.every(
        ({ execution }) => execution.tool?.returnDirect === true && !execution.error,
      );
      if (direct) {
        const answer = executions.map(({ execution }) => execution.content).join("\n\n");
        return this.finish(conversation, answer, rounds);
      }
    }
  }

  /** Sequential on purpose: results must line up with their call ids. */
  private async executeRound(
    conversation: ConversationState,
    calls: ToolCall[],
  ): Promise<Array<{ call: ToolCall; execution: ToolExecution }>> {
    const executions: Array<{ call: ToolCall; execution: ToolExecution }> = [];
    for (const call of calls) {
      this.log.debug("Calling tool", { tool: call.name, callId: call.id });
      const execution = await this.registry.execute(call);

      appendTurn(conversation, {
        role: "tool",
        callId: call.id,
        name: call.name,
        content: execution.content,
        ...(execution.error ? { error: execution.error.kind } : {}),
      });

      updateContext(conversation, { lastOperation: call.name });
      if (execution.error) {
        this.log.warn("Tool returned an error", {
          tool: call.name,
          kind: execution.error.kind,
          error: execution.error.message,
        });
      } else if (execution.tool?.trackContext) {
        updateContext(conversation, execution.tool.trackContext(call.arguments));
      }
      executions.push({ call, execution });
    }
    return executions;
  }

  private finish(
    conversation: ConversationState,
    answer: string,
    rounds: number,
  ): AgentChatResult {
    appendTurn(conversation, { role: "assistant", content: answer, toolCalls: [] });
    this.transition("done");
    return { response: answer, state: conversation, rounds };
  }

  private transition(to: AgentPhase): void {
    const from = this.currentPhase;
    if (from === to) return;
    this.currentPhase = to;
    this.onTransition?.(from, to);
  }
}

function remediationHint(message: string, location: string): string {
  if (/timed out/i.test(message)) {
    return (
      `The tool server at ${location} did not answer in time. ` +
      "Check that it is running and reachable, or raise MCP_CONNECT_TIMEOUT_MS."
    );
  }
  return (
    `Start the tool server at ${location} and make sure its credentials ` +
    "(for example the OAuth token file it reads) are in place."
  );
}
