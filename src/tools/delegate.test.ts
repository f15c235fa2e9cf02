import { describe, it, expect } from "vitest";
import { Agent } from "../agent.js";
import { MockLLMProvider, textResponse } from "../llm/mock-provider.js";
import { createDelegateTool, type SubAgentHandle } from "./delegate.js";
import { ToolRegistry } from "./registry.js";

function makeHandle(llm: MockLLMProvider): SubAgentHandle {
  return {
    id: "notes",
    displayName: "Notes Agent",
    description: "Handles notes.",
    agent: new Agent({
      config: { name: "notes-agent", baseInstructions: "You keep notes.", model: "mock" },
      llm,
      registry: new ToolRegistry(),
    }),
  };
}

describe("delegate tool", () => {
  it("describes a returnDirect tool taking the raw request", () => {
    const tool = createDelegateTool(makeHandle(new MockLLMProvider([])));

    expect(tool.definition.name).toBe("notes_agent");
    expect(tool.definition.parameters.required).toEqual(["user_request"]);
    expect(tool.definition.description).toContain("Handles notes.");
    expect(tool.returnDirect).toBe(true);
    expect(tool.delegatesTo).toBe("notes");
    expect(tool.trackContext?.({})).toEqual({ activeSubAgent: "Notes Agent" });
  });

  it("forwards the request and returns the sub-agent's answer unchanged", async () => {
    const llm = new MockLLMProvider([textResponse("  Noted: buy milk.\n")]);
    const handle = makeHandle(llm);
    await handle.agent.start();
    const tool = createDelegateTool(handle);

    const result = await tool.handler({ user_request: "note: buy milk" });

    expect(result).toBe("  Noted: buy milk.\n");
    expect(llm.calls[0].turns).toEqual([{ role: "user", content: "note: buy milk" }]);
  });

  it("keeps the sub-agent's conversation between delegations", async () => {
    const llm = new MockLLMProvider([textResponse("first"), textResponse("second")]);
    const handle = makeHandle(llm);
    await handle.agent.start();
    const tool = createDelegateTool(handle);

    await tool.handler({ user_request: "one" });
    const firstState = handle.state;
    await tool.handler({ user_request: "two" });

    expect(handle.state).toBe(firstState);
    expect(handle.state?.turnCount).toBe(2);
    expect(llm.calls[1].turns).toHaveLength(3);
  });

  it("turns a sub-agent failure into an error result", async () => {
    const tool = createDelegateTool(makeHandle(new MockLLMProvider([])));

    const result = await tool.handler({ user_request: "anything" });

    expect(result).toEqual({
      text: "Error with Notes Agent: notes-agent is not started; call start() before chat()",
      error: {
        kind: "execution",
        message: "notes-agent is not started; call start() before chat()",
      },
    });
  });
});
