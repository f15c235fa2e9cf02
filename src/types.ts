/**
 * Core type definitions for the orchestrator.
 *
 * Layered the same way the code is: Turn → Tool → Agent → Router.
 */

import type { ToolError, ToolErrorKind } from "./errors.js";

// ---------------------------------------------------------------------------
// Turns
// ---------------------------------------------------------------------------

export interface ToolCall {
  /** Correlation id chosen by the reasoning backend */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface UserTurn {
  role: "user";
  content: string;
}

export interface AssistantTurn {
  role: "assistant";
  content: string | null;
  /** Empty when the turn is a final answer */
  toolCalls: ToolCall[];
}

export interface ToolResultTurn {
  role: "tool";
  /** Id of the call in the preceding assistant turn */
  callId: string;
  name: string;
  content: string;
  error?: ToolErrorKind;
}

export type Turn = UserTurn | AssistantTurn | ToolResultTurn;

/**
 * Advisory, session-scoped hints rendered into the system prompt.
 * Never required for correctness.
 */
export interface ContextFields {
  currentItemId?: string;
  currentListId?: string;
  lastOperation?: string;
  searchContext?: string;
  activeSubAgent?: string;
  [field: string]: string | undefined;
}

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

export interface ToolParameter {
  type: string;
  description?: string;
  enum?: string[];
  items?: ToolParameter;
  properties?: Record<string, ToolParameter>;
  required?: string[];
  /** Filled in by the registry when the caller omits the argument */
  default?: unknown;
}

export interface ToolSchema {
  type: "object";
  properties: Record<string, ToolParameter>;
  required?: string[];
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolSchema;
}

/** A rendered error: the text goes to the conversation, the error tags the turn */
export interface ToolFailure {
  text: string;
  error: ToolError;
}

export type ToolOutput = string | ToolFailure;

/** The runtime handler that actually executes a tool call. Must not throw. */
export type ToolHandler = (args: Record<string, unknown>) => Promise<ToolOutput>;

export interface Tool {
  definition: ToolDefinition;
  handler: ToolHandler;
  /**
   * When every call in a round targets a returnDirect tool, the joined
   * outputs are the round's answer and no further reasoning pass runs.
   */
  returnDirect?: boolean;
  /** Id of the sub-agent this tool forwards to, if any */
  delegatesTo?: string;
  /** Context-field updates to apply after a successful call */
  trackContext?: (args: Record<string, unknown>) => ContextFields;
}

// ---------------------------------------------------------------------------
// Agent configuration
// ---------------------------------------------------------------------------

export interface AgentConfig {
  /** Display name */
  name: string;
  /** Base system instructions (role, personality, constraints) */
  baseInstructions: string;
  /** Model identifier, e.g. "gpt-4o-mini" */
  model: string;
  /** Reasoning rounds allowed per user message before a forced answer */
  maxRounds?: number;
}

// ---------------------------------------------------------------------------
// LLM abstraction (thin wrapper so we can swap providers or mock in tests)
// ---------------------------------------------------------------------------

export interface LLMResponse {
  content: string | null;
  toolCalls: ToolCall[];
  finishReason: "stop" | "tool_calls" | "length" | "content_filter";
}

export interface LLMProvider {
  chat(
    systemPrompt: string,
    turns: readonly Turn[],
    tools: ToolDefinition[],
  ): Promise<LLMResponse>;
}
