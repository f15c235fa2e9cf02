import { describe, it, expect } from "vitest";
import {
  configuredLogLevel,
  DEFAULT_GMAIL_MCP_URL,
  DEFAULT_TODO_MCP_URL,
  loadConfig,
  validateConfig,
} from "./config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-secret" });

    expect(config).toEqual({
      llm: { apiKey: "test-secret", baseURL: undefined, model: "gpt-4o-mini", maxTokens: 4096 },
      mcp: {
        gmailUrl: DEFAULT_GMAIL_MCP_URL,
        todoUrl: DEFAULT_TODO_MCP_URL,
        connectTimeoutMs: 10_000,
        requestTimeoutMs: 30_000,
      },
      agent: { maxRounds: 10 },
      logLevel: "info",
    });
    expect(validateConfig(config)).toEqual([]);
  });

  it("reads overrides", () => {
    const config = loadConfig({
      OPENAI_API_KEY: "test-secret",
      OPENAI_BASE_URL: "http://localhost:11434/v1",
      LLM_MODEL: "local-model",
      GMAIL_MCP_URL: "http://mail.internal:5001/mcp",
      AGENT_MAX_ROUNDS: "4",
      LOG_LEVEL: "debug",
    });

    expect(config.llm.baseURL).toBe("http://localhost:11434/v1");
    expect(config.llm.model).toBe("local-model");
    expect(config.mcp.gmailUrl).toBe("http://mail.internal:5001/mcp");
    expect(config.agent.maxRounds).toBe(4);
    expect(configuredLogLevel(config)).toBe("debug");
  });
});

describe("validateConfig", () => {
  it("reports every problem at once", () => {
    const config = loadConfig({
      TODO_MCP_URL: "not a url",
      MCP_REQUEST_TIMEOUT_MS: "soon",
      AGENT_MAX_ROUNDS: "0",
      LOG_LEVEL: "loud",
    });

    expect(validateConfig(config)).toEqual([
      "OPENAI_API_KEY is required",
      "TODO_MCP_URL must be an http(s) URL, got not a url",
      "MCP_REQUEST_TIMEOUT_MS must be a positive integer, got NaN",
      "AGENT_MAX_ROUNDS must be a positive integer, got 0",
      "LOG_LEVEL must be one of debug, info, warn, error, silent, got loud",
    ]);
    expect(configuredLogLevel(config)).toBe("info");
  });
});
