import { ProtocolError } from "./errors.js";
import type { ContextFields, Turn } from "./types.js";

/**
 * Conversation state threaded through one session.
 *
 * History is append-only: turns are added through {@link appendTurn} and
 * never reordered or removed. What the backend actually sees is chosen by a
 * {@link HistoryPolicy}, which reads the history without touching it.
 */

export interface ConversationState {
  readonly history: Turn[];
  contextFields: ContextFields;
  /** Timestamp of session creation */
  readonly createdAt: number;
  /** Number of user turns so far */
  turnCount: number;
}

export function createConversationState(now: number = Date.now()): ConversationState {
  return {
    history: [],
    contextFields: {},
    createdAt: now,
    turnCount: 0,
  };
}

/**
 * Append a turn, enforcing the call-id pairing:
 * call ids are unique within an assistant turn, and
 * a tool result must answer a call of the latest assistant turn, once.
 */
export function appendTurn(state: ConversationState, turn: Turn): void {
  if (turn.role === "assistant") {
    const seen = new Set<string>();
    for (const call of turn.toolCalls) {
      if (seen.has(call.id)) {
        throw new ProtocolError(
          `Assistant turn repeats call id "${call.id}" for "${call.name}"`,
          { callId: call.id },
        );
      }
      seen.add(call.id);
    }
  }
  if (turn.role === "tool") {
    const pending = pendingCallIds(state);
    if (!pending.includes(turn.callId)) {
      throw new ProtocolError(
        `Tool result for "${turn.name}" references call id "${turn.callId}", ` +
          "which is not pending in the latest assistant turn",
        { callId: turn.callId, pending },
      );
    }
  }
  state.history.push(turn);
  if (turn.role === "user") state.turnCount++;
}

/** Call ids of the latest assistant turn that have no result yet. */
export function pendingCallIds(state: ConversationState): string[] {
  const { history } = state;
  let index = history.length - 1;
  const answered = new Set<string>();
  while (index >= 0) {
    const turn = history[index];
    if (turn.role === "tool") {
      answered.add(turn.callId);
      index--;
      continue;
    }
    if (turn.role === "assistant") {
      return turn.toolCalls.map((c) => c.id).filter((id) => !answered.has(id));
    }
    return [];
  }
  return [];
}

/** Merge context hints. An empty string clears a field. */
export function updateContext(state: ConversationState, fields: ContextFields): void {
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    if (value === "") {
      delete state.contextFields[key];
    } else {
      state.contextFields[key] = value;
    }
  }
}

// ---------------------------------------------------------------------------
// History policy
// ---------------------------------------------------------------------------

export interface HistoryPolicy {
  readonly name: string;
  /** Pick the turns replayed to the backend. Must not mutate `history`. */
  select(history: readonly Turn[]): readonly Turn[];
}

/** Replays the whole conversation every time. */
export const unboundedHistory: HistoryPolicy = {
  name: "unbounded",
  select: (history) => history,
};
