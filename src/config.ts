import { isLogLevel, type LogLevel } from "./logger.js";

/**
 * Application configuration, read from environment variables.
 *
 * The CLI loads `.env` (dotenv) before calling {@link loadConfig}; tests pass
 * an explicit env object. Missing or bad values are not thrown on here:
 * {@link validateConfig} reports all of them at once.
 */

export type Env = Record<string, string | undefined>;

export const DEFAULT_GMAIL_MCP_URL = "http://127.0.0.1:5001/mcp";
export const DEFAULT_TODO_MCP_URL = "http://127.0.0.1:8080/mcp/";

export interface AppConfig {
  llm: {
    /** Missing values are caught by validateConfig */
    apiKey: string | undefined;
    baseURL: string | undefined;
    model: string;
    maxTokens: number;
  };
  mcp: {
    gmailUrl: string;
    todoUrl: string;
    connectTimeoutMs: number;
    requestTimeoutMs: number;
  };
  agent: {
    maxRounds: number;
  };
  logLevel: string;
}

function optional(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

/** NaN for values that are present but not integers, so validation can name them */
function optionalInt(env: Env, key: string, defaultValue: number): number {
  const raw = env[key];
  if (!raw) return defaultValue;
  return /^-?\d+$/.test(raw.trim()) ? parseInt(raw, 10) : NaN;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    llm: {
      apiKey: env.OPENAI_API_KEY || undefined,
      baseURL: env.OPENAI_BASE_URL || undefined,
      model: optional(env, "LLM_MODEL", "gpt-4o-mini"),
      maxTokens: optionalInt(env, "LLM_MAX_TOKENS", 4096),
    },
    mcp: {
      gmailUrl: optional(env, "GMAIL_MCP_URL", DEFAULT_GMAIL_MCP_URL),
      todoUrl: optional(env, "TODO_MCP_URL", DEFAULT_TODO_MCP_URL),
      connectTimeoutMs: optionalInt(env, "MCP_CONNECT_TIMEOUT_MS", 10_000),
      requestTimeoutMs: optionalInt(env, "MCP_REQUEST_TIMEOUT_MS", 30_000),
    },
    agent: {
      maxRounds: optionalInt(env, "AGENT_MAX_ROUNDS", 10),
    },
    logLevel: optional(env, "LOG_LEVEL", "info"),
  };
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

/** Every problem with the configuration; empty when it is usable. */
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (!config.llm.apiKey) errors.push("OPENAI_API_KEY is required");
  if (config.llm.baseURL !== undefined && !isHttpUrl(config.llm.baseURL)) {
    errors.push(`OPENAI_BASE_URL must be an http(s) URL, got ${config.llm.baseURL}`);
  }

  if (!isHttpUrl(config.mcp.gmailUrl)) {
    errors.push(`GMAIL_MCP_URL must be an http(s) URL, got ${config.mcp.gmailUrl}`);
  }
  if (!isHttpUrl(config.mcp.todoUrl)) {
    errors.push(`TODO_MCP_URL must be an http(s) URL, got ${config.mcp.todoUrl}`);
  }

  const positive: Array<[string, number]> = [
    ["LLM_MAX_TOKENS", config.llm.maxTokens],
    ["MCP_CONNECT_TIMEOUT_MS", config.mcp.connectTimeoutMs],
    ["MCP_REQUEST_TIMEOUT_MS", config.mcp.requestTimeoutMs],
    ["AGENT_MAX_ROUNDS", config.agent.maxRounds],
  ];
  for (const [key, value] of positive) {
    if (!Number.isInteger(value) || value < 1) {
      errors.push(`${key} must be a positive integer, got ${value}`);
    }
  }

  if (!isLogLevel(config.logLevel)) {
    errors.push(`LOG_LEVEL must be one of debug, info, warn, error, silent, got ${config.logLevel}`);
  }

  return errors;
}

export function configuredLogLevel(config: AppConfig): LogLevel {
  return isLogLevel(config.logLevel) ? config.logLevel : "info";
}
