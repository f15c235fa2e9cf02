import { describe, it, expect } from "vitest";
import { Agent, FALLBACK_ANSWER, type AgentPhase } from "./agent.js";
import { AgentNotStartedError, InitializationError, ProtocolError } from "./errors.js";
import { ToolRegistry, defineTool } from "./tools/registry.js";
import {
  MockLLMProvider,
  textResponse,
  toolCall,
  toolCallResponse,
} from "./llm/mock-provider.js";
import { ToolInvoker } from "./mcp/invoker.js";
import { MockToolServer } from "./mcp/mock-server.js";
import type { AgentConfig } from "./types.js";

const config: AgentConfig = {
  name: "test-agent",
  baseInstructions: "You are a helpful test agent.",
  model: "mock",
  maxRounds: 3,
};

const now = () => new Date("2026-01-15T10:00:00Z");

function makeRegistry(): ToolRegistry {
  const reg = new ToolRegistry();
  reg.register(
    defineTool(
      {
        name: "echo",
        description: "Echo the input",
        parameters: {
          type: "object",
          properties: { input: { type: "string", description: "Text to echo" } },
          required: ["input"],
        },
      },
      async (args) => `echo: ${String(args.input)}`,
      { trackContext: (args) => ({ searchContext: String(args.input) }) },
    ),
  );
  reg.register(
    defineTool(
      {
        name: "boom",
        description: "Always throws",
        parameters: { type: "object", properties: {} },
      },
      async () => {
        throw new Error("kaput");
      },
    ),
  );
  reg.register(
    defineTool(
      {
        name: "lookup",
        description: "Answers directly",
        parameters: { type: "object", properties: {} },
      },
      async () => "looked up",
      { returnDirect: true },
    ),
  );
  return reg;
}

async function startedAgent(llm: MockLLMProvider, registry = makeRegistry()): Promise<Agent> {
  const agent = new Agent({ config, llm, registry, now });
  await agent.start();
  return agent;
}

describe("Agent: turn loop", () => {
  it("returns the text unchanged when the backend requests no tools", async () => {
    const llm = new MockLLMProvider([textResponse("Hello! How can I help?")]);
    const agent = await startedAgent(llm);

    const result = await agent.chat("Hi");

    expect(result.response).toBe("Hello! How can I help?");
    expect(result.rounds).toBe(0);
    expect(result.state.history).toEqual([
      { role: "user", content: "Hi" },
      { role: "assistant", content: "Hello! How can I help?", toolCalls: [] },
    ]);
    expect(llm.calls).toHaveLength(1);
  });

  it("returns an empty answer when the backend sends neither text nor calls", async () => {
    const llm = new MockLLMProvider([{ content: null, toolCalls: [], finishReason: "stop" }]);
    const agent = await startedAgent(llm);

    const result = await agent.chat("Hi");

    expect(result.response).toBe("");
  });

  it("appends results in the requested order without de-duplicating", async () => {
    const llm = new MockLLMProvider([
      toolCallResponse(
        [
          toolCall("a", "echo", { input: "1" }),
          toolCall("b", "echo", { input: "2" }),
          toolCall("c", "echo", { input: "1" }),
        ],
        "Working on it.",
      ),
      textResponse("done"),
    ]);
    const agent = await startedAgent(llm);

    const result = await agent.chat("echo things");

    expect(result.response).toBe("done");
    expect(result.rounds).toBe(1);
    const toolTurns = result.state.history.slice(2, 5);
    expect(toolTurns).toEqual([
      { role: "tool", callId: "a", name: "echo", content: "echo: 1" },
      { role: "tool", callId: "b", name: "echo", content: "echo: 2" },
      { role: "tool", callId: "c", name: "echo", content: "echo: 1" },
    ]);
    expect(llm.calls[1].turns).toHaveLength(5);
  });

  it("contains unknown tools, bad arguments and thrown handlers as error results", async () => {
    const llm = new MockLLMProvider([
      toolCallResponse([
        toolCall("x", "archive_message", {}),
        toolCall("y", "boom"),
        toolCall("z", "echo", {}),
      ]),
      textResponse("Sorry, that did not work."),
    ]);
    const agent = await startedAgent(llm);

    const result = await agent.chat("do it");

    expect(result.response).toBe("Sorry, that did not work.");
    expect(llm.calls[1].turns.slice(2)).toEqual([
      {
        role: "tool",
        callId: "x",
        name: "archive_message",
        content: 'Error: unknown tool "archive_message". Available tools: echo, boom, lookup',
        error: "unknown_tool",
      },
      {
        role: "tool",
        callId: "y",
        name: "boom",
        content: "Error running boom: kaput",
        error: "execution",
      },
      {
        role: "tool",
        callId: "z",
        name: "echo",
        content: "Error calling echo: missing required argument(s): input",
        error: "invalid_arguments",
      },
    ]);
  });

  it("forces an answer without tools once maxRounds is reached", async () => {
    const llm = new MockLLMProvider((_call, index) =>
      toolCallResponse([toolCall(`c${index}`, "echo", { input: String(index) })]),
    );
    const agent = new Agent({ config: { ...config, maxRounds: 2 }, llm, registry: makeRegistry(), now });
    await agent.start();

    const result = await agent.chat("loop forever");

    expect(result.rounds).toBe(2);
    expect(result.response).toBe(FALLBACK_ANSWER);
    expect(llm.calls).toHaveLength(3);
    expect(llm.calls[2].tools).toEqual([]);
    expect(llm.calls[2].systemPrompt).toContain("[FINAL STEP: You CANNOT call any tools.");
    expect(result.state.history).toHaveLength(6);
    expect(result.state.history[5]).toEqual({
      role: "assistant",
      content: FALLBACK_ANSWER,
      toolCalls: [],
    });
  });

  it("keeps the forced answer's text when there is one", async () => {
    const llm = new MockLLMProvider([
      toolCallResponse([toolCall("a", "echo", { input: "1" })]),
      toolCallResponse([toolCall("b", "echo", { input: "2" })], "Here is what I found."),
    ]);
    const agent = new Agent({ config: { ...config, maxRounds: 1 }, llm, registry: makeRegistry(), now });
    await agent.start();

    const result = await agent.chat("go");

    expect(result.response).toBe("Here is what I found.");
    expect(result.rounds).toBe(1);
  });

  it("ends the round with the tool output when every call is returnDirect", async () => {
    const llm = new MockLLMProvider([toolCallResponse([toolCall("l", "lookup")])]);
    const agent = await startedAgent(llm);

    const result = await agent.chat("look it up");

    expect(result.response).toBe("looked up");
    expect(result.rounds).toBe(1);
    expect(llm.calls).toHaveLength(1);
    expect(result.state.history.at(-1)).toEqual({
      role: "assistant",
      content: "looked up",
      toolCalls: [],
    });
  });

  it("reasons again when a round mixes returnDirect and ordinary tools", async () => {
    const llm = new MockLLMProvider([
      toolCallResponse([toolCall("e", "echo", { input: "hi" }), toolCall("l", "lookup")]),
      textResponse("final"),
    ]);
    const agent = await startedAgent(llm);

    const result = await agent.chat("both");

    expect(result.response).toBe("final");
    expect(llm.calls).toHaveLength(2);
  });

  it("reasons again when a returnDirect call fails", async () => {
    const registry = makeRegistry();
    registry.register(
      defineTool(
        {
          name: "relay",
          description: "Answers directly, or fails",
          parameters: {
            type: "object",
            properties: { target: { type: "string", description: "Where to relay" } },
            required: ["target"],
          },
        },
        async (args) => `relayed to ${String(args.target)}`,
        { returnDirect: true },
      ),
    );
    const llm = new MockLLMProvider([
      toolCallResponse([toolCall("r", "relay")]),
      textResponse("Sorry, I could not relay that."),
    ]);
    const agent = await startedAgent(llm, registry);

    const result = await agent.chat("relay it");

    expect(result.response).toBe("Sorry, I could not relay that.");
    expect(llm.calls).toHaveLength(2);
    expect(llm.calls[1].turns.at(-1)).toEqual({
      role: "tool",
      callId: "r",
      name: "relay",
      content: "Error calling relay: missing required argument(s): target",
      error: "invalid_arguments",
    });
  });

  it("runs nothing when the backend repeats a call id", async () => {
    const sent: string[] = [];
    const registry = makeRegistry();
    registry.register(
      defineTool(
        {
          name: "send",
          description: "Sends a message",
          parameters: { type: "object", properties: {} },
        },
        async () => {
          sent.push("sent");
          return "sent";
        },
      ),
    );
    const llm = new MockLLMProvider([
      toolCallResponse([toolCall("c1", "send"), toolCall("c1", "send")]),
    ]);
    const agent = await startedAgent(llm, registry);
    await expect(agent.chat("send it")).rejects.toThrow(ProtocolError);
    expect(sent).toEqual([]);
    expect(agent.phase).toBe("awaiting_input");
  });

  it("continues a conversation passed back in", async () => {
    const llm = new MockLLMProvider([textResponse("one"), textResponse("two")]);
    const agent = await startedAgent(llm);

    const first = await agent.chat("first");
    const second = await agent.chat("second", first.state);

    expect(second.state).toBe(first.state);
    expect(second.state.turnCount).toBe(2);
    expect(second.state.history).toHaveLength(4);
    expect(llm.calls[1].turns).toHaveLength(3);
  });

  it("tracks context fields from successful calls", async () => {
    const llm = new MockLLMProvider([
      toolCallResponse([toolCall("a", "echo", { input: "invoices" })]),
      textResponse("ok"),
    ]);
    const agent = await startedAgent(llm);

    const result = await agent.chat("search invoices");

    expect(result.state.contextFields).toEqual({
      lastOperation: "echo",
      searchContext: "invoices",
    });
    expect(llm.calls[1].systemPrompt).toContain("- Recent search context: invoices");
    expect(llm.calls[1].systemPrompt).toContain("- Last operation: echo");
  });

  it("records lastOperation but skips tracking when the call fails", async () => {
    const llm = new MockLLMProvider([
      toolCallResponse([toolCall("a", "echo", {})]),
      textResponse("ok"),
    ]);
    const agent = await startedAgent(llm);

    const result = await agent.chat("echo nothing");

    expect(result.state.contextFields).toEqual({ lastOperation: "echo" });
  });

  it("reports each tool round through onStep", async () => {
    const steps: Array<{ round: number; names: string[]; results: string[] }> = [];
    const llm = new MockLLMProvider([
      toolCallResponse([toolCall("a", "echo", { input: "1" })], "thinking"),
      textResponse("done"),
    ]);
    const agent = new Agent({
      config,
      llm,
      registry: makeRegistry(),
      now,
      onStep: ({ round, toolCalls, toolResults }) => {
        steps.push({
          round,
          names: toolCalls.map((tc) => tc.name),
          results: toolResults.map((tr) => tr.result),
        });
      },
    });
    await agent.start();

    await agent.chat("go");

    expect(steps).toEqual([{ round: 1, names: ["echo"], results: ["echo: 1"] }]);
  });
});

describe("Agent: lifecycle", () => {
  it("walks through the phases of a tool round", async () => {
    const transitions: string[] = [];
    const llm = new MockLLMProvider([
      toolCallResponse([toolCall("a", "echo", { input: "1" })]),
      textResponse("done"),
    ]);
    const agent = new Agent({
      config,
      llm,
      registry: makeRegistry(),
      onTransition: (from: AgentPhase, to: AgentPhase) => transitions.push(`${from}->${to}`),
    });

    await agent.start();
    await agent.chat("go");

    expect(transitions).toEqual([
      "idle->awaiting_input",
      "awaiting_input->reasoning",
      "reasoning->executing_tools",
      "executing_tools->reasoning",
      "reasoning->done",
      "done->awaiting_input",
    ]);
    expect(agent.phase).toBe("awaiting_input");
  });

  it("refuses to chat before start", async () => {
    const agent = new Agent({ config, llm: new MockLLMProvider([]), registry: makeRegistry() });

    await expect(agent.chat("Hi")).rejects.toThrow(AgentNotStartedError);
    await expect(agent.chat("Hi")).rejects.toThrow(
      "test-agent is not started; call start() before chat()",
    );
  });

  it("stays idle when its tool server cannot be reached", async () => {
    const server = new MockToolServer();
    server.connectError = new Error("ECONNREFUSED");
    const invoker = new ToolInvoker({
      name: "mock",
      endpoint: { transport: "http", url: "http://127.0.0.1:9/mcp" },
      connect: server.factory,
    });
    const agent = new Agent({
      config,
      llm: new MockLLMProvider([]),
      registry: makeRegistry(),
      invoker,
    });

    const error = await agent.start().then(
      () => undefined,
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(InitializationError);
    if (!(error instanceof InitializationError)) return;
    expect(error.message).toBe(
      "test-agent could not reach its tool server at http://127.0.0.1:9/mcp: ECONNREFUSED",
    );
    expect(error.hint).toContain("Start the tool server at http://127.0.0.1:9/mcp");
    expect(agent.phase).toBe("idle");
    await expect(agent.chat("Hi")).rejects.toThrow(AgentNotStartedError);
  });

  it("connects on start and disconnects on stop", async () => {
    const server = new MockToolServer();
    const invoker = new ToolInvoker({
      name: "mock",
      endpoint: { transport: "http", url: "http://127.0.0.1:9/mcp" },
      connect: server.factory,
    });
    const agent = new Agent({
      config,
      llm: new MockLLMProvider([]),
      registry: makeRegistry(),
      invoker,
    });

    await agent.start();
    expect(server.connectCount).toBe(1);
    expect(invoker.connected).toBe(true);

    await agent.stop();
    expect(server.closeCount).toBe(1);
    expect(agent.phase).toBe("idle");
  });

  it("recovers from a backend failure", async () => {
    const llm = new MockLLMProvider((_call, index) => {
      if (index === 0) throw new Error("rate limited");
      return textResponse("back again");
    });
    const agent = await startedAgent(llm);

    await expect(agent.chat("first")).rejects.toThrow("rate limited");
    expect(agent.phase).toBe("awaiting_input");

    const result = await agent.chat("second");
    expect(result.response).toBe("back again");
  });
});
