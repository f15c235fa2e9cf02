import {
  errorMessage,
  fail,
  ok,
  toolError,
  type Result,
} from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import {
  describeEndpoint,
  type SessionFactory,
  type ToolEndpoint,
  type ToolServerSession,
} from "./session.js";

/**
 * ToolInvoker: one agent's connection to its tool-serving process.
 *
 * - Connects lazily and at most once at a time; an established session is
 *   reused, a dropped one is replaced on the next call.
 * - Every reply is decoded into a `Result`: transport problems, empty or
 *   malformed replies and server-reported errors come back as values.
 */

export type ToolPayload = Record<string, unknown>;

export interface RemoteToolDescriptor {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface ToolInvokerOptions {
  /** Short label used in logs and messages, e.g. "gmail" */
  name: string;
  endpoint: ToolEndpoint;
  connect: SessionFactory;
  connectTimeoutMs?: number;
  requestTimeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const PREVIEW_CHARS = 120;

export class ToolInvoker {
  readonly name: string;
  readonly endpoint: ToolEndpoint;
  private readonly openSession: SessionFactory;
  private readonly connectTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly log: Logger;
  private session: ToolServerSession | null = null;
  private connecting: Promise<ToolServerSession> | null = null;

  constructor(options: ToolInvokerOptions) {
    this.name = options.name;
    this.endpoint = options.endpoint;
    this.openSession = options.connect;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.log = options.logger ?? createLogger(`invoker:${options.name}`);
  }

  get connected(): boolean {
    return this.session !== null;
  }

  get location(): string {
    return describeEndpoint(this.endpoint);
  }

  /** Establish the session if there is none. Rejects when the server is unreachable. */
  async connect(): Promise<void> {
    await this.ensureSession();
  }

  /** Call a remote tool and decode its first content item. */
  async invoke(
    toolName: string,
    args: Record<string, unknown> = {},
  ): Promise<Result<ToolPayload>> {
    let session: ToolServerSession;
    try {
      session = await this.ensureSession();
    } catch (err) {
      return fail(
        toolError("transport", `Could not connect to ${this.name} tool server: ${errorMessage(err)}`),
      );
    }

    let reply: unknown;
    try {
      reply = await withTimeout(
        session.callTool(toolName, args),
        this.requestTimeoutMs,
        `${toolName} timed out after ${this.requestTimeoutMs}ms`,
      );
    } catch (err) {
      await this.dropSession(session);
      const message = `Error calling tool ${toolName}: ${errorMessage(err)}`;
      this.log.warn("Tool call failed", { tool: toolName, error: errorMessage(err) });
      return fail(toolError("transport", message));
    }

    const result = decodeToolReply(reply);
    this.log.debug("Tool call finished", { tool: toolName, success: result.success });
    return result;
  }

  /** Read a resource snapshot such as `gmail://messages`. */
  async readResource(uri: string): Promise<Result<ToolPayload>> {
    let reply: unknown;
    try {
      const session = await this.ensureSession();
      reply = await withTimeout(
        session.readResource(uri),
        this.requestTimeoutMs,
        `reading ${uri} timed out after ${this.requestTimeoutMs}ms`,
      );
    } catch (err) {
      await this.dropSession(this.session);
      return fail(toolError("transport", `Error reading resource ${uri}: ${errorMessage(err)}`));
    }

    if (!isRecord(reply) || !Array.isArray(reply.contents)) {
      return fail(toolError("malformed_result", "Resource reply has no contents list"));
    }
    return decodeFirstItem(reply.contents, false);
  }

  /** The server's declarative tool descriptors. */
  async listTools(): Promise<Result<RemoteToolDescriptor[]>> {
    let reply: unknown;
    try {
      const session = await this.ensureSession();
      reply = await withTimeout(
        session.listTools(),
        this.requestTimeoutMs,
        `listing tools timed out after ${this.requestTimeoutMs}ms`,
      );
    } catch (err) {
      await this.dropSession(this.session);
      return fail(toolError("transport", `Error listing tools: ${errorMessage(err)}`));
    }

    if (!isRecord(reply) || !Array.isArray(reply.tools)) {
      return fail(toolError("malformed_result", "Tool listing has no tools array"));
    }
    const tools: RemoteToolDescriptor[] = [];
    for (const entry of reply.tools) {
      if (!isRecord(entry) || typeof entry.name !== "string") continue;
      tools.push({
        name: entry.name,
        description: typeof entry.description === "string" ? entry.description : "",
        inputSchema: isRecord(entry.inputSchema) ? entry.inputSchema : {},
      });
    }
    return ok(tools);
  }

  /** Release the session. Safe to call when not connected. */
  async close(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (!session) return;
    try {
      await session.close();
      this.log.info("Disconnected", { endpoint: this.location });
    } catch (err) {
      this.log.warn("Error while closing session", { error: errorMessage(err) });
    }
  }

  private async ensureSession(): Promise<ToolServerSession> {
    if (this.session) return this.session;
    if (this.connecting) return this.connecting;

    this.log.info("Connecting", { endpoint: this.location });
    const opening = this.openSession(this.endpoint);
    this.connecting = withTimeout(
      opening,
      this.connectTimeoutMs,
      `connection to ${this.location} timed out after ${this.connectTimeoutMs}ms`,
    );
    try {
      const session = await this.connecting;
      this.session = session;
      this.log.info("Connected", { endpoint: this.location });
      return session;
    } catch (err) {
      // a session that shows up after the timeout is closed, not adopted
      void opening.then(
        (late) => late.close(),
        () => undefined,
      ).catch((closeErr: unknown) => {
        this.log.debug("Error closing late session", { error: errorMessage(closeErr) });
      });
      throw err;
    } finally {
      this.connecting = null;
    }
  }

  private async dropSession(session: ToolServerSession | null): Promise<void> {
    if (!session || this.session !== session) return;
    this.session = null;
    try {
      await session.close();
    } catch (err) {
      this.log.debug("Ignoring close error on dropped session", { error: errorMessage(err) });
    }
  }
}

// ---------------------------------------------------------------------------
// Reply decoding
// ---------------------------------------------------------------------------

export function decodeToolReply(reply: unknown): Result<ToolPayload> {
  if (!isRecord(reply) || !Array.isArray(reply.content)) {
    return fail(toolError("malformed_result", "Tool reply has no content list"));
  }
  return decodeFirstItem(reply.content, reply.isError === true);
}

function decodeFirstItem(items: unknown[], flaggedError: boolean): Result<ToolPayload> {
  if (items.length === 0) {
    return fail(toolError("empty_result", "No result received from tool server"));
  }

  const first = items[0];
  if (!isRecord(first) || typeof first.text !== "string") {
    return fail(toolError("malformed_result", "First content item is not text"));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(first.text);
  } catch {
    if (flaggedError) return fail(toolError("remote", first.text));
    return fail(
      toolError("malformed_result", `Tool server returned non-JSON content: ${preview(first.text)}`),
    );
  }

  if (!isRecord(parsed)) {
    return fail(toolError("malformed_result", "Tool server returned JSON that is not an object"));
  }
  if (parsed.error !== undefined && parsed.error !== null && parsed.error !== false) {
    return fail(toolError("remote", remoteMessage(parsed.error)));
  }
  if (flaggedError) {
    return fail(toolError("remote", "Tool server reported an error without details"));
  }
  return ok(parsed);
}

function remoteMessage(error: unknown): string {
  if (typeof error === "string") return error;
  if (isRecord(error) && typeof error.message === "string") return error.message;
  return JSON.stringify(error);
}

function preview(text: string): string {
  return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS)}...` : text;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  message: string,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(message)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
