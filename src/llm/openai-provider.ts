import OpenAI from "openai";
import { AppError } from "../errors.js";
import { isRecord } from "../mcp/invoker.js";
import type {
  LLMProvider,
  LLMResponse,
  ToolCall,
  ToolDefinition,
  Turn,
} from "../types.js";

/**
 * OpenAI-compatible LLM provider.
 * Works with OpenAI and any endpoint that speaks the chat-completions API.
 *
 * The conversion functions are exported so the mapping between turns and
 * chat-completion messages can be tested without a network.
 */
export class OpenAIProvider implements LLMProvider {
  private client: OpenAI;
  private model: string;
  private maxTokens: number;

  constructor(options: {
    apiKey?: string;
    baseURL?: string;
    model: string;
    maxTokens?: number;
  }) {
    this.client = new OpenAI({
      apiKey: options.apiKey ?? process.env.OPENAI_API_KEY,
      baseURL: options.baseURL ?? process.env.OPENAI_BASE_URL,
    });
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 4096;
  }

  async chat(
    systemPrompt: string,
    turns: readonly Turn[],
    tools: ToolDefinition[],
  ): Promise<LLMResponse> {
    const openaiTools = toOpenAITools(tools);
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: toOpenAIMessages(systemPrompt, turns),
      tools: openaiTools.length > 0 ? openaiTools : undefined,
      max_tokens: this.maxTokens,
    });
    return fromOpenAICompletion(completion);
  }
}

export function toOpenAIMessages(
  systemPrompt: string,
  turns: readonly Turn[],
): OpenAI.ChatCompletionMessageParam[] {
  const messages: OpenAI.ChatCompletionMessageParam[] = [
    { role: "system", content: systemPrompt },
  ];
  for (const turn of turns) {
    switch (turn.role) {
      case "user":
        messages.push({ role: "user", content: turn.content });
        break;
      case "tool":
        messages.push({ role: "tool", tool_call_id: turn.callId, content: turn.content });
        break;
      case "assistant":
        if (turn.toolCalls.length > 0) {
          messages.push({
            role: "assistant",
            content: turn.content,
            tool_calls: turn.toolCalls.map((tc) => ({
              id: tc.id,
              type: "function" as const,
              function: { name: tc.name, arguments: JSON.stringify(tc.arguments) },
            })),
          });
        } else {
          messages.push({ role: "assistant", content: turn.content ?? "" });
        }
        break;
    }
  }
  return messages;
}

export function toOpenAITools(tools: ToolDefinition[]): OpenAI.ChatCompletionTool[] {
  return tools.map((t) => ({
    type: "function" as const,
    function: {
      name: t.name,
      description: t.description,
      parameters: { ...t.parameters },
    },
  }));
}

/**
 * Decode the JSON argument string of a tool call. Anything that is not a JSON
 * object becomes `{}`; the registry then reports the missing arguments.
 */
export function parseToolArguments(raw: string): Record<string, unknown> {
  if (!raw.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

export function fromOpenAICompletion(completion: OpenAI.ChatCompletion): LLMResponse {
  const choice = completion.choices[0];
  if (!choice) {
    throw new AppError("The language model returned no choices", "BACKEND", true, {
      id: completion.id,
    });
  }

  const toolCalls: ToolCall[] = (choice.message.tool_calls ?? [])
    .filter((tc) => tc.type === "function")
    .map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      arguments: parseToolArguments(tc.function.arguments),
    }));

  const finishReason =
    choice.finish_reason === "tool_calls" || choice.finish_reason === "function_call"
      ? "tool_calls"
      : choice.finish_reason === "length"
        ? "length"
        : choice.finish_reason === "content_filter"
          ? "content_filter"
          : "stop";

  return {
    content: choice.message.content ?? null,
    toolCalls,
    finishReason,
  };
}
