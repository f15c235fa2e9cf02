import { describe, it, expect } from "vitest";
import {
  appendTurn,
  createConversationState,
  pendingCallIds,
  unboundedHistory,
  updateContext,
} from "./conversation.js";
import { ProtocolError } from "./errors.js";

function withPendingCalls() {
  const state = createConversationState(1000);
  appendTurn(state, { role: "user", content: "hi" });
  appendTurn(state, {
    role: "assistant",
    content: null,
    toolCalls: [
      { id: "a", name: "one", arguments: {} },
      { id: "b", name: "two", arguments: {} },
    ],
  });
  return state;
}

describe("ConversationState", () => {
  it("starts empty", () => {
    const state = createConversationState(1000);
    expect(state).toEqual({ history: [], contextFields: {}, createdAt: 1000, turnCount: 0 });
  });

  it("counts user turns", () => {
    const state = createConversationState();
    appendTurn(state, { role: "user", content: "one" });
    appendTurn(state, { role: "assistant", content: "ok", toolCalls: [] });
    appendTurn(state, { role: "user", content: "two" });
    expect(state.turnCount).toBe(2);
    expect(state.history).toHaveLength(3);
  });

  it("tracks which calls still need a result", () => {
    const state = withPendingCalls();
    expect(pendingCallIds(state)).toEqual(["a", "b"]);

    appendTurn(state, { role: "tool", callId: "a", name: "one", content: "1" });
    expect(pendingCallIds(state)).toEqual(["b"]);

    appendTurn(state, { role: "tool", callId: "b", name: "two", content: "2" });
    expect(pendingCallIds(state)).toEqual([]);
  });

  it("rejects a result for an unknown call id", () => {
    const state = withPendingCalls();
    expect(() =>
      appendTurn(state, { role: "tool", callId: "zzz", name: "one", content: "1" }),
    ).toThrow(ProtocolError);
    expect(state.history).toHaveLength(2);
  });

  it("rejects a second result for the same call id", () => {
    const state = withPendingCalls();
    appendTurn(state, { role: "tool", callId: "a", name: "one", content: "1" });
    expect(() =>
      appendTurn(state, { role: "tool", callId: "a", name: "one", content: "again" }),
    ).toThrow('references call id "a"');
  });

  it("rejects a result when no assistant turn asked for it", () => {
    const state = createConversationState();
    appendTurn(state, { role: "user", content: "hi" });
    expect(() =>
      appendTurn(state, { role: "tool", callId: "a", name: "one", content: "1" }),
    ).toThrow(ProtocolError);
  });

  it("rejects an assistant turn that repeats a call id", () => {
    const state = createConversationState();
    appendTurn(state, { role: "user", content: "hi" });
    expect(() =>
      appendTurn(state, {
        role: "assistant",
        content: null,
        toolCalls: [
          { id: "a", name: "one", arguments: {} },
          { id: "a", name: "two", arguments: {} },
        ],
      }),
    ).toThrow('Assistant turn repeats call id "a" for "two"');
    expect(state.history).toHaveLength(1);
  });
});

describe("updateContext", () => {
  it("merges fields, skips undefined and clears on empty string", () => {
    const state = createConversationState();
    updateContext(state, { currentListId: "L1", searchContext: "invoices" });
    updateContext(state, { currentListId: undefined, searchContext: "", lastOperation: "list_tasks" });

    expect(state.contextFields).toEqual({ currentListId: "L1", lastOperation: "list_tasks" });
  });
});

describe("unboundedHistory", () => {
  it("selects every turn without copying or changing them", () => {
    const state = withPendingCalls();
    const selected = unboundedHistory.select(state.history);
    expect(selected).toEqual(state.history);
    expect(state.history).toHaveLength(2);
  });
});
