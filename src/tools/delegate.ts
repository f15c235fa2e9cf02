import type { Agent } from "../agent.js";
import type { ConversationState } from "../conversation.js";
import { errorMessage, toolError } from "../errors.js";
import type { Tool } from "../types.js";
import { defineTool, failure } from "./registry.js";
import { argString } from "./render.js";

/**
 * Delegation tool: the router's way into a sub-agent.
 *
 * The raw request goes to the sub-agent together with the state it kept from
 * its previous delegation, and the sub-agent's answer comes back untouched.
 * Tools built here are `returnDirect`, so a round that only delegates ends
 * with that answer instead of another router reasoning pass.
 */

export interface SubAgentHandle {
  readonly id: string;
  readonly displayName: string;
  /** What the sub-agent handles; shown to the router's backend */
  readonly description: string;
  readonly agent: Agent;
  /** The sub-agent's conversation, owned by the router between delegations */
  state?: ConversationState;
}

export function delegateToolName(id: string): string {
  return `${id}_agent`;
}

export function createDelegateTool(handle: SubAgentHandle): Tool {
  return defineTool(
    {
      name: delegateToolName(handle.id),
      description:
        `${handle.description} ` +
        `ALWAYS use this tool for any request related to ${handle.displayName}. ` +
        "Pass the user's request exactly as they wrote it.",
      parameters: {
        type: "object",
        properties: {
          user_request: {
            type: "string",
            description: "The user's original request, unchanged",
          },
        },
        required: ["user_request"],
      },
    },
    async (args) => {
      try {
        const result = await handle.agent.chat(argString(args, "user_request"), handle.state);
        handle.state = result.state;
        return result.response;
      } catch (err) {
        return failure(`with ${handle.displayName}`, toolError("execution", errorMessage(err)));
      }
    },
    {
      returnDirect: true,
      delegatesTo: handle.id,
      trackContext: () => ({ activeSubAgent: handle.displayName }),
    },
  );
}
