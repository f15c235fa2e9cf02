import type { ToolInvoker, ToolPayload } from "../mcp/invoker.js";
import type { Tool } from "../types.js";
import { defineTool, failure } from "./registry.js";
import {
  argNumber,
  argString,
  field,
  numberField,
  optionalField,
  record,
  records,
  stringList,
  succeeded,
  truncate,
  unconfirmed,
} from "./render.js";

/**
 * Gmail tool adapters.
 *
 * Each one forwards to the Gmail MCP server under the same tool name and
 * renders the JSON reply into a fixed text layout. Field budgets keep a
 * listing of ten messages readable.
 */

const FROM_CHARS = 40;
const SUBJECT_CHARS = 60;
const DATE_CHARS = 32;
const BODY_CHARS = 1000;
const LISTED_LABELS = 3;

const MESSAGE_ID = {
  type: "string",
  description: "The ID of the message",
} as const;

function forQuery(query: string): string {
  return query ? ` for query: ${query}` : "";
}

function messageIdContext(args: Record<string, unknown>) {
  return { currentItemId: argString(args, "message_id") };
}

export function renderMessageList(messages: ToolPayload[], query: string): string {
  if (messages.length === 0) return `No messages found${forQuery(query)}.`;

  const lines = [`Found ${messages.length} messages${forQuery(query)}:`, ""];
  messages.forEach((msg, i) => {
    const labels = stringList(msg, "labelIds").slice(0, LISTED_LABELS).join(", ");
    lines.push(`${i + 1}. From: ${truncate(field(msg, "from", "Unknown"), FROM_CHARS)}`);
    lines.push(`   Subject: ${truncate(field(msg, "subject", "No Subject"), SUBJECT_CHARS)}`);
    lines.push(`   Date: ${truncate(field(msg, "date", "Unknown"), DATE_CHARS)}`);
    lines.push(`   Labels: ${labels || "(none)"}`);
    lines.push(`   ID: ${field(msg, "id", "Unknown")}`);
    lines.push("");
  });
  return lines.join("\n").trimEnd();
}

export function renderMessageDetail(message: ToolPayload): string {
  const lines = [
    "Message Details:",
    `From: ${field(message, "from", "Unknown")}`,
    `To: ${field(message, "to", "Unknown")}`,
    `Subject: ${field(message, "subject", "No Subject")}`,
    `Date: ${field(message, "date", "Unknown")}`,
    `Labels: ${stringList(message, "labelIds").join(", ") || "(none)"}`,
  ];
  const cc = optionalField(message, "cc");
  if (cc) lines.push(`CC: ${cc}`);

  const body = optionalField(message, "body");
  if (body) {
    lines.push("", "Body:", truncate(body, BODY_CHARS, "... (truncated)"));
  }

  const attachments = records(message, "attachments");
  if (attachments.length > 0) {
    lines.push("", `Attachments (${attachments.length}):`);
    for (const att of attachments) {
      lines.push(`  - ${field(att, "filename", "Unknown")} (${field(att, "mimeType", "Unknown type")})`);
    }
  }
  return lines.join("\n");
}

export function renderSearchResults(messages: ToolPayload[], query: string): string {
  if (messages.length === 0) return `No messages found for search query: ${query}`;

  const lines = [`Search Results (${messages.length} messages) for: ${query}`, ""];
  messages.forEach((msg, i) => {
    lines.push(`${i + 1}. ${truncate(field(msg, "subject", "No Subject"), SUBJECT_CHARS)}`);
    lines.push(`   From: ${truncate(field(msg, "from", "Unknown"), FROM_CHARS)}`);
    lines.push(`   Date: ${truncate(field(msg, "date", "Unknown"), DATE_CHARS)}`);
    lines.push(`   ID: ${field(msg, "id", "Unknown")}`);
    lines.push("");
  });
  return lines.join("\n").trimEnd();
}

export function renderLabels(labels: ToolPayload[]): string {
  if (labels.length === 0) return "No labels found.";

  const lines = [`Available Gmail Labels (${labels.length}):`, ""];
  for (const label of labels) {
    lines.push(`- ${field(label, "name", "Unknown")} (ID: ${field(label, "id", "Unknown")})`);
    lines.push(
      `  Type: ${field(label, "type", "Unknown")} | ` +
        `Total: ${numberField(label, "messagesTotal")} | ` +
        `Unread: ${numberField(label, "messagesUnread")}`,
    );
  }
  return lines.join("\n");
}

export function createGmailTools(invoker: ToolInvoker): Tool[] {
  const listMessages = defineTool(
    {
      name: "list_messages",
      description: "Get Gmail messages with an optional Gmail search query.",
      parameters: {
        type: "object",
        properties: {
          query: {
            type: "string",
            description: "Search query, e.g. 'from:user@example.com is:unread' or 'subject:important'",
            default: "",
          },
          max_results: {
            type: "integer",
            description: "Maximum number of messages to return",
            default: 10,
          },
        },
      },
    },
    async (args) => {
      const query = argString(args, "query");
      const result = await invoker.invoke("list_messages", {
        query,
        max_results: argNumber(args, "max_results", 10),
      });
      if (!result.success) return failure("listing messages", result.error);
      return renderMessageList(records(result.data, "messages"), query);
    },
    {
      trackContext: (args) => {
        const query = argString(args, "query");
        return query ? { searchContext: query } : {};
      },
    },
  );

  const getMessage = defineTool(
    {
      name: "get_message",
      description: "Get detailed information about a specific Gmail message, including its body.",
      parameters: {
        type: "object",
        properties: { message_id: MESSAGE_ID },
        required: ["message_id"],
      },
    },
    async (args) => {
      const result = await invoker.invoke("get_message", {
        message_id: argString(args, "message_id"),
      });
      if (!result.success) return failure("getting message", result.error);
      const message = record(result.data, "message");
      return message ? renderMessageDetail(message) : "Message not found.";
    },
    { trackContext: messageIdContext },
  );

  const searchMessages = defineTool(
    {
      name: "search_messages",
      description: "Search Gmail messages with advanced query syntax, e.g. 'from:boss@company.com after:2026/01/01'.",
      parameters: {
        type: "object",
        properties: {
          query: { type: "string", description: "Gmail search query" },
          max_results: {
            type: "integer",
            description: "Maximum number of results",
            default: 10,
          },
        },
        required: ["query"],
      },
    },
    async (args) => {
      const query = argString(args, "query");
      const result = await invoker.invoke("search_messages", {
        query,
        max_results: argNumber(args, "max_results", 10),
      });
      if (!result.success) return failure("searching messages", result.error);
      return renderSearchResults(records(result.data, "messages"), query);
    },
    { trackContext: (args) => ({ searchContext: argString(args, "query") }) },
  );

  const sendMessage = defineTool(
    {
      name: "send_message",
      description: "Send a new Gmail message.",
      parameters: {
        type: "object",
        properties: {
          to: { type: "string", description: "Recipient email address" },
          subject: { type: "string", description: "Email subject" },
          body: { type: "string", description: "Email body content" },
          cc: { type: "string", description: "CC recipients (optional)" },
          bcc: { type: "string", description: "BCC recipients (optional)" },
        },
        required: ["to", "subject", "body"],
      },
    },
    async (args) => {
      const to = argString(args, "to");
      const subject = argString(args, "subject");
      const params: Record<string, unknown> = { to, subject, body: argString(args, "body") };
      const cc = argString(args, "cc");
      const bcc = argString(args, "bcc");
      if (cc) params.cc = cc;
      if (bcc) params.bcc = bcc;

      const result = await invoker.invoke("send_message", params);
      if (!result.success) return failure("sending message", result.error);
      if (!succeeded(result.data)) return unconfirmed("sending message");
      return [
        "Email sent successfully!",
        `To: ${to}`,
        `Subject: ${subject}`,
        `Message ID: ${field(result.data, "messageId", "Unknown")}`,
      ].join("\n");
    },
  );

  const replyToMessage = defineTool(
    {
      name: "reply_to_message",
      description: "Reply to an existing Gmail message.",
      parameters: {
        type: "object",
        properties: {
          message_id: { type: "string", description: "ID of the message to reply to" },
          reply_body: { type: "string", description: "Content of the reply" },
        },
        required: ["message_id", "reply_body"],
      },
    },
    async (args) => {
      const messageId = argString(args, "message_id");
      const result = await invoker.invoke("reply_to_message", {
        message_id: messageId,
        reply_body: argString(args, "reply_body"),
      });
      if (!result.success) return failure("sending reply", result.error);
      if (!succeeded(result.data)) return unconfirmed("sending reply");
      return [
        "Reply sent successfully!",
        `Original Message ID: ${messageId}`,
        `Reply ID: ${field(result.data, "messageId", "Unknown")}`,
      ].join("\n");
    },
    { trackContext: messageIdContext },
  );

  const markRead = createReadStateTool(invoker, "read");
  const markUnread = createReadStateTool(invoker, "unread");
  const addLabel = createLabelTool(invoker, "add");
  const removeLabel = createLabelTool(invoker, "remove");

  const listLabels = defineTool(
    {
      name: "list_labels",
      description: "Get all available Gmail labels with message counts.",
      parameters: { type: "object", properties: {} },
    },
    async () => {
      const result = await invoker.invoke("list_labels");
      if (!result.success) return failure("listing labels", result.error);
      return renderLabels(records(result.data, "labels"));
    },
  );

  return [
    listMessages,
    getMessage,
    searchMessages,
    sendMessage,
    replyToMessage,
    markRead,
    markUnread,
    addLabel,
    removeLabel,
    listLabels,
  ];
}

function createReadStateTool(invoker: ToolInvoker, state: "read" | "unread"): Tool {
  const name = `mark_message_as_${state}`;
  const operation = `marking message as ${state}`;
  return defineTool(
    {
      name,
      description: `Mark a Gmail message as ${state}.`,
      parameters: {
        type: "object",
        properties: { message_id: MESSAGE_ID },
        required: ["message_id"],
      },
    },
    async (args) => {
      const messageId = argString(args, "message_id");
      const result = await invoker.invoke(name, { message_id: messageId });
      if (!result.success) return failure(operation, result.error);
      if (!succeeded(result.data)) return unconfirmed(operation);
      return `Message marked as ${state} (ID: ${messageId})`;
    },
    { trackContext: messageIdContext },
  );
}

function createLabelTool(invoker: ToolInvoker, action: "add" | "remove"): Tool {
  const name = action === "add" ? "add_label_to_message" : "remove_label_from_message";
  const operation = action === "add" ? "adding label" : "removing label";
  const past = action === "add" ? "added to" : "removed from";
  return defineTool(
    {
      name,
      description:
        action === "add"
          ? "Add a label to a Gmail message (e.g. 'IMPORTANT', 'STARRED')."
          : "Remove a label from a Gmail message.",
      parameters: {
        type: "object",
        properties: {
          message_id: MESSAGE_ID,
          label_id: { type: "string", description: `ID of the label to ${action}` },
        },
        required: ["message_id", "label_id"],
      },
    },
    async (args) => {
      const messageId = argString(args, "message_id");
      const labelId = argString(args, "label_id");
      const result = await invoker.invoke(name, { message_id: messageId, label_id: labelId });
      if (!result.success) return failure(operation, result.error);
      if (!succeeded(result.data)) return unconfirmed(operation);
      const current = stringList(result.data, "labelIds").join(", ");
      return `Label '${labelId}' ${past} message (ID: ${messageId})\nCurrent labels: ${current || "(none)"}`;
    },
    { trackContext: messageIdContext },
  );
}
