export {
  Agent,
  FALLBACK_ANSWER,
  type AgentChatResult,
  type AgentOptions,
  type AgentPhase,
  type OnStepCallback,
  type OnTransitionCallback,
} from "./agent.js";
export { Router, type RouterOptions, type SubAgentSpec, type SubAgentTools } from "./router.js";
export {
  createRouter,
  createSubAgents,
  createGmailAgent,
  createTodoAgent,
  createToolAgent,
} from "./agents/index.js";
export { ContextBuilder, type ContextBuildResult } from "./context-builder.js";
export {
  appendTurn,
  createConversationState,
  unboundedHistory,
  type ConversationState,
  type HistoryPolicy,
} from "./conversation.js";
export { ToolRegistry, defineTool, failure } from "./tools/registry.js";
export { createGmailTools } from "./tools/gmail.js";
export { createTodoTools } from "./tools/todo.js";
export { createDelegateTool, type SubAgentHandle } from "./tools/delegate.js";
export { ToolInvoker, decodeToolReply, type ToolInvokerOptions } from "./mcp/invoker.js";
export { createSdkSessionFactory } from "./mcp/sdk-session.js";
export { MockToolServer, textReply } from "./mcp/mock-server.js";
export type { SessionFactory, ToolEndpoint, ToolServerSession } from "./mcp/session.js";
export { buildSystemPrompt } from "./prompt/system-prompt.js";
export { loadConfig, validateConfig, type AppConfig } from "./config.js";
export { createLogger, setLogLevel, type Logger, type LogLevel } from "./logger.js";
export * from "./errors.js";
export { OpenAIProvider } from "./llm/openai-provider.js";
export { MockLLMProvider } from "./llm/mock-provider.js";
export type * from "./types.js";
