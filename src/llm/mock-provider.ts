import type {
  LLMProvider,
  LLMResponse,
  ToolCall,
  ToolDefinition,
  Turn,
} from "../types.js";

/** What the provider was asked on one call */
export interface MockLLMCall {
  systemPrompt: string;
  turns: Turn[];
  tools: ToolDefinition[];
}

/** Computes a response from the request, for conversations that depend on tool output */
export type MockResponder = (call: MockLLMCall, index: number) => LLMResponse;

/**
 * Mock LLM provider for testing.
 * Returns pre-configured responses in sequence, or asks a responder function.
 */
export class MockLLMProvider implements LLMProvider {
  private script: LLMResponse[] | MockResponder;
  private callIndex = 0;
  /** Records all calls for assertion */
  public calls: MockLLMCall[] = [];

  constructor(script: LLMResponse[] | MockResponder) {
    this.script = script;
  }

  async chat(
    systemPrompt: string,
    turns: readonly Turn[],
    tools: ToolDefinition[],
  ): Promise<LLMResponse> {
    const call: MockLLMCall = { systemPrompt, turns: [...turns], tools: [...tools] };
    this.calls.push(call);
    const index = this.callIndex++;

    if (typeof this.script === "function") return this.script(call, index);

    const response = this.script[index];
    if (!response) {
      return {
        content: "No more mock responses configured.",
        toolCalls: [],
        finishReason: "stop",
      };
    }
    return response;
  }

  /** Reset call counter (reuse same responses) */
  reset(): void {
    this.callIndex = 0;
    this.calls = [];
  }
}

/** A final text answer */
export function textResponse(content: string): LLMResponse {
  return { content, toolCalls: [], finishReason: "stop" };
}

/** A response requesting the given tool calls */
export function toolCallResponse(calls: ToolCall[], content: string | null = null): LLMResponse {
  return { content, toolCalls: calls, finishReason: "tool_calls" };
}

export function toolCall(
  id: string,
  name: string,
  args: Record<string, unknown> = {},
): ToolCall {
  return { id, name, arguments: args };
}
