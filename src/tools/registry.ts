import { ConfigurationError, errorMessage, toolError, type ToolError } from "../errors.js";
import type {
  Tool,
  ToolCall,
  ToolDefinition,
  ToolFailure,
  ToolHandler,
} from "../types.js";

/**
 * Per-agent tool registry.
 *
 * Responsibilities:
 * 1. Register tools with schema + handler, rejecting duplicate names
 * 2. Resolve a tool by name for execution
 * 3. Validate required arguments and fill declared defaults
 * 4. Export definitions array for LLM function-calling
 *
 * `execute` never throws: every outcome is text plus an optional error tag.
 */

export interface ToolExecution {
  content: string;
  error?: ToolError;
  /** The resolved tool, absent when the name was unknown */
  tool?: Tool;
}

export class ToolRegistry {
  private tools = new Map<string, Tool>();

  register(tool: Tool): void {
    if (this.tools.has(tool.definition.name)) {
      throw new ConfigurationError(
        `Tool "${tool.definition.name}" is already registered`,
        { tool: tool.definition.name },
      );
    }
    this.tools.set(tool.definition.name, tool);
  }

  registerAll(tools: Tool[]): void {
    for (const tool of tools) this.register(tool);
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Execute one requested call */
  async execute(call: ToolCall): Promise<ToolExecution> {
    const tool = this.tools.get(call.name);
    if (!tool) {
      const available = this.names().join(", ") || "(none)";
      const error = toolError("unknown_tool", `Unknown tool: ${call.name}`);
      return {
        content: `Error: unknown tool "${call.name}". Available tools: ${available}`,
        error,
      };
    }

    const missing = missingArguments(tool.definition, call.arguments);
    if (missing.length > 0) {
      const error = toolError(
        "invalid_arguments",
        `missing required argument(s): ${missing.join(", ")}`,
      );
      return { content: `Error calling ${call.name}: ${error.message}`, error, tool };
    }

    try {
      const output = await tool.handler(withDefaults(tool.definition, call.arguments));
      if (typeof output === "string") return { content: output, tool };
      return { content: output.text, error: output.error, tool };
    } catch (err) {
      const error = toolError("execution", errorMessage(err));
      return { content: `Error running ${call.name}: ${error.message}`, error, tool };
    }
  }

  /** Return definitions for all registered tools */
  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((t) => t.definition);
  }

  list(): Tool[] {
    return [...this.tools.values()];
  }

  /** Number of registered tools */
  get size(): number {
    return this.tools.size;
  }

  /** All registered tool names */
  names(): string[] {
    return [...this.tools.keys()];
  }
}

function missingArguments(
  definition: ToolDefinition,
  args: Record<string, unknown>,
): string[] {
  const required = definition.parameters.required ?? [];
  return required.filter((name) => args[name] === undefined || args[name] === null);
}

function withDefaults(
  definition: ToolDefinition,
  args: Record<string, unknown>,
): Record<string, unknown> {
  const filled: Record<string, unknown> = { ...args };
  for (const [name, param] of Object.entries(definition.parameters.properties)) {
    if (filled[name] === undefined && param.default !== undefined) {
      filled[name] = param.default;
    }
  }
  return filled;
}

// ---------------------------------------------------------------------------
// Helpers to build tools from parts
// ---------------------------------------------------------------------------

export function defineTool(
  definition: ToolDefinition,
  handler: ToolHandler,
  extras: Omit<Tool, "definition" | "handler"> = {},
): Tool {
  return { definition, handler, ...extras };
}

/** Render a failure as `Error <operation>: <message>` and keep the error attached */
export function failure(operation: string, error: ToolError): ToolFailure {
  return { text: `Error ${operation}: ${error.message}`, error };
}
