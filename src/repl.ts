import { errorMessage, type Result } from "./errors.js";
import { createLogger } from "./logger.js";
import type { ToolPayload } from "./mcp/invoker.js";
import type { Router, SubAgentTools } from "./router.js";

/**
 * Interactive loop around a Router. Input and output go through {@link ReplIO}
 * so the loop runs the same against a terminal and against a test script.
 */

export interface ReplIO {
  /** Next input line, or null once input has ended */
  read(prompt: string): Promise<string | null>;
  write(text: string): void;
}

export type ReplCommand = "reset" | "tools" | "resources" | "help";

export type ReplInput =
  | { kind: "empty" }
  | { kind: "exit" }
  | { kind: "command"; command: ReplCommand; args: string[] }
  | { kind: "unknown_command"; name: string }
  | { kind: "message"; text: string };

export const EXIT_WORDS = ["quit", "exit", "bye", "q"] as const;

const COMMANDS: readonly ReplCommand[] = ["reset", "tools", "resources", "help"];

export const HELP_TEXT = [
  "Commands:",
  "  /reset                    forget the conversation",
  "  /tools                    list the tools each tool server offers",
  "  /resources <agent> <uri>  read a resource, e.g. /resources gmail gmail://labels",
  "  /help                     show this help",
  `Type ${EXIT_WORDS.map((w) => `'${w}'`).join(", ")} to leave.`,
].join("\n");

const log = createLogger("repl");

export function isExitCommand(line: string): boolean {
  const word = line.trim().toLowerCase();
  return EXIT_WORDS.some((w) => w === word);
}

function isCommand(name: string): name is ReplCommand {
  return COMMANDS.some((c) => c === name);
}

export function parseInput(line: string): ReplInput {
  const text = line.trim();
  if (!text) return { kind: "empty" };
  if (isExitCommand(text)) return { kind: "exit" };
  if (text.startsWith("/")) {
    const [head = "", ...args] = text.slice(1).split(/\s+/);
    const name = head.toLowerCase();
    return isCommand(name)
      ? { kind: "command", command: name, args }
      : { kind: "unknown_command", name: head };
  }
  return { kind: "message", text };
}

export function renderToolListings(listings: SubAgentTools[]): string {
  const blocks = listings.map(({ id, displayName, tools }) => {
    const header = `${displayName} (${id}):`;
    if (!tools.success) return `${header}\n  unavailable: ${tools.error.message}`;
    if (tools.data.length === 0) return `${header}\n  (no tools)`;
    return [header, ...tools.data.map((t) => `  - ${t.name}: ${t.description}`)].join("\n");
  });
  return blocks.join("\n\n");
}

export function renderResource(result: Result<ToolPayload>): string {
  if (!result.success) return `Error: ${result.error.message}`;
  return JSON.stringify(result.data, null, 2);
}

/** Execute one parsed input; returns false when the loop should end */
export async function handleInput(router: Router, input: ReplInput, io: ReplIO): Promise<boolean> {
  switch (input.kind) {
    case "empty":
      return true;
    case "exit":
      io.write("Goodbye!");
      return false;
    case "unknown_command":
      io.write(`Unknown command: /${input.name}. Type /help for the list of commands.`);
      return true;
    case "command":
      await runCommand(router, input.command, input.args, io);
      return true;
    case "message":
      try {
        const result = await router.chat(input.text);
        io.write(`Assistant: ${result.response}`);
      } catch (err) {
        log.error("Request failed", { error: errorMessage(err) });
        io.write(`Error: ${errorMessage(err)}`);
      }
      return true;
  }
}

async function runCommand(
  router: Router,
  command: ReplCommand,
  args: string[],
  io: ReplIO,
): Promise<void> {
  switch (command) {
    case "help":
      io.write(HELP_TEXT);
      return;
    case "reset":
      router.reset();
      io.write("Conversation reset.");
      return;
    case "tools":
      io.write(renderToolListings(await router.remoteTools()));
      return;
    case "resources": {
      const [agentId, uri] = args;
      if (!agentId || !uri) {
        io.write("Usage: /resources <agent> <uri>");
        return;
      }
      try {
        io.write(renderResource(await router.readResource(agentId, uri)));
      } catch (err) {
        io.write(`Error: ${errorMessage(err)}`);
      }
      return;
    }
  }
}

export async function runRepl(router: Router, io: ReplIO): Promise<void> {
  while (true) {
    const line = await io.read("You: ");
    if (line === null) return;
    if (!(await handleInput(router, parseInput(line), io))) return;
  }
}

/** Answer each request in order within one conversation */
export async function runBatch(router: Router, requests: string[], io: ReplIO): Promise<void> {
  for (const request of requests) {
    io.write(`You: ${request}`);
    await handleInput(router, { kind: "message", text: request }, io);
  }
}
