import type { AgentConfig, ContextFields, ToolDefinition } from "../types.js";

/**
 * Dynamic system prompt builder.
 *
 * Assembles the system prompt from:
 *   base instructions + runtime info + tool descriptions + current context hints
 *
 * Context hints are advisory; the prompt is complete without them.
 */

export interface SystemPromptParts {
  config: AgentConfig;
  tools: ToolDefinition[];
  contextFields?: ContextFields;
  now?: Date;
}

const CONTEXT_LABELS: Record<string, string> = {
  activeSubAgent: "Working with",
  currentItemId: "Currently focused on ID",
  currentListId: "Current list ID",
  searchContext: "Recent search context",
  lastOperation: "Last operation",
};

export function buildSystemPrompt(parts: SystemPromptParts): string {
  const sections: string[] = [];

  // 1. Base instructions (role, personality, constraints)
  sections.push(parts.config.baseInstructions);

  // 2. Runtime info
  sections.push(buildRuntimeSection(parts.config, parts.now ?? new Date()));

  // 3. Available tools
  if (parts.tools.length > 0) {
    sections.push(buildToolsSection(parts.tools));
  }

  // 4. Current context
  const context = renderContextFields(parts.contextFields ?? {});
  if (context) {
    sections.push(`## Current Context\n\n${context}`);
  }

  return sections.join("\n\n---\n\n");
}

function buildRuntimeSection(config: AgentConfig, now: Date): string {
  return [
    "## Runtime Information",
    "",
    `- Agent: ${config.name}`,
    `- Model: ${config.model}`,
    `- Current date: ${now.toISOString().slice(0, 10)}`,
  ].join("\n");
}

function buildToolsSection(tools: ToolDefinition[]): string {
  const lines = [
    "## Available Tools",
    "",
    "You have access to the following tools. " +
      "Call them by emitting a tool_call in your response.",
    "",
  ];
  for (const t of tools) {
    lines.push(`- **${t.name}**: ${t.description}`);
  }
  return lines.join("\n");
}

/** One `- Label: value` line per non-empty field, known fields first */
export function renderContextFields(fields: ContextFields): string {
  const known = Object.keys(CONTEXT_LABELS);
  const keys = [
    ...known.filter((k) => fields[k]),
    ...Object.keys(fields).filter((k) => !known.includes(k) && fields[k]).sort(),
  ];
  return keys.map((k) => `- ${CONTEXT_LABELS[k] ?? k}: ${fields[k]}`).join("\n");
}
