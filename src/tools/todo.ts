import type { ToolInvoker, ToolPayload } from "../mcp/invoker.js";
import type { Tool, ToolParameter } from "../types.js";
import { defineTool, failure } from "./registry.js";
import {
  argString,
  field,
  optionalField,
  record,
  records,
  succeeded,
  truncate,
  unconfirmed,
} from "./render.js";

/**
 * Microsoft To-Do tool adapters, one per operation of the To-Do MCP server.
 */

const DESCRIPTION_CHARS = 50;

const LIST_ID: ToolParameter = { type: "string", description: "The ID of the task list" };
const TASK_ID: ToolParameter = { type: "string", description: "The ID of the task" };

const TASK_STATUSES = ["notStarted", "completed"] as const;

function listContext(args: Record<string, unknown>) {
  return { currentListId: argString(args, "list_id") };
}

function taskContext(args: Record<string, unknown>) {
  return {
    currentListId: argString(args, "list_id"),
    currentItemId: argString(args, "task_id"),
  };
}

function dueSuffix(task: ToolPayload): string {
  const due = optionalField(task, "dueDate");
  return due ? ` (Due: ${due})` : "";
}

export function renderTaskLists(lists: ToolPayload[]): string {
  if (lists.length === 0) return "No task lists found.";
  const lines = [`Found ${lists.length} task lists:`];
  lists.forEach((list, i) => {
    const shared = list.isShared === true ? " (Shared)" : "";
    lines.push(`${i + 1}. ${field(list, "name", "Untitled")} (ID: ${field(list, "id", "Unknown")})${shared}`);
  });
  return lines.join("\n");
}

export function renderTasks(tasks: ToolPayload[], listId: string): string {
  if (tasks.length === 0) return `No tasks found in this list (ID: ${listId})`;
  const lines = [`Found ${tasks.length} tasks:`];
  tasks.forEach((task, i) => {
    const mark = task.status === "completed" ? "[x]" : "[ ]";
    const description = optionalField(task, "description");
    const summary = description ? ` - ${truncate(description, DESCRIPTION_CHARS)}` : "";
    lines.push(
      `${i + 1}. ${mark} ${field(task, "title", "Untitled")}${dueSuffix(task)}${summary} ` +
        `(ID: ${field(task, "id", "Unknown")})`,
    );
  });
  return lines.join("\n");
}

/** Run a task operation whose reply is `{ success, task }` and describe the task */
async function taskOperation(
  invoker: ToolInvoker,
  name: string,
  params: Record<string, unknown>,
  operation: string,
  describe: (title: string, id: string, task: ToolPayload) => string,
) {
  const result = await invoker.invoke(name, params);
  if (!result.success) return failure(operation, result.error);
  const task = record(result.data, "task");
  if (!succeeded(result.data) || !task) return unconfirmed(operation);
  return describe(field(task, "title", "Untitled"), field(task, "id", "Unknown"), task);
}

export function createTodoTools(invoker: ToolInvoker): Tool[] {
  const listTaskLists = defineTool(
    {
      name: "list_task_lists",
      description: "Get all Microsoft To-Do task lists for the user, with their IDs.",
      parameters: { type: "object", properties: {} },
    },
    async () => {
      const result = await invoker.invoke("list_task_lists");
      if (!result.success) return failure("listing task lists", result.error);
      return renderTaskLists(records(result.data, "taskLists"));
    },
  );

  const createTaskList = defineTool(
    {
      name: "create_task_list",
      description: "Create a new task list in Microsoft To-Do.",
      parameters: {
        type: "object",
        properties: { name: { type: "string", description: "The name for the new task list" } },
        required: ["name"],
      },
    },
    async (args) => {
      const result = await invoker.invoke("create_task_list", { name: argString(args, "name") });
      if (!result.success) return failure("creating task list", result.error);
      const list = record(result.data, "taskList");
      if (!succeeded(result.data) || !list) return unconfirmed("creating task list");
      return `Successfully created task list '${field(list, "name", "Untitled")}' (ID: ${field(list, "id", "Unknown")})`;
    },
  );

  const deleteTaskList = defineTool(
    {
      name: "delete_task_list",
      description: "Delete a task list from Microsoft To-Do.",
      parameters: {
        type: "object",
        properties: { list_id: LIST_ID },
        required: ["list_id"],
      },
    },
    async (args) => {
      const listId = argString(args, "list_id");
      const result = await invoker.invoke("delete_task_list", { list_id: listId });
      if (!result.success) return failure("deleting task list", result.error);
      if (!succeeded(result.data)) return unconfirmed("deleting task list");
      return `Successfully deleted task list (ID: ${listId})`;
    },
  );

  const listTasks = defineTool(
    {
      name: "list_tasks",
      description: "Get all tasks in a specific task list.",
      parameters: {
        type: "object",
        properties: { list_id: LIST_ID },
        required: ["list_id"],
      },
    },
    async (args) => {
      const listId = argString(args, "list_id");
      const result = await invoker.invoke("list_tasks", { list_id: listId });
      if (!result.success) return failure("listing tasks", result.error);
      return renderTasks(records(result.data, "tasks"), listId);
    },
    { trackContext: listContext },
  );

  const createTask = defineTool(
    {
      name: "create_task",
      description: "Create a new task in a task list.",
      parameters: {
        type: "object",
        properties: {
          list_id: LIST_ID,
          title: { type: "string", description: "The title of the task" },
          description: { type: "string", description: "The description of the task", default: "" },
          due_date: { type: "string", description: "The due date in YYYY-MM-DD format", default: "" },
        },
        required: ["list_id", "title"],
      },
    },
    async (args) =>
      taskOperation(
        invoker,
        "create_task",
        {
          list_id: argString(args, "list_id"),
          title: argString(args, "title"),
          description: argString(args, "description"),
          due_date: argString(args, "due_date"),
        },
        "creating task",
        (title, id, task) => `Successfully created task '${title}'${dueSuffix(task)} (ID: ${id})`,
      ),
    { trackContext: listContext },
  );

  const updateTask = defineTool(
    {
      name: "update_task",
      description: "Update an existing task. Only the fields you pass are changed.",
      parameters: {
        type: "object",
        properties: {
          list_id: LIST_ID,
          task_id: TASK_ID,
          title: { type: "string", description: "New title for the task" },
          description: { type: "string", description: "New description for the task" },
          due_date: {
            type: "string",
            description: "New due date in YYYY-MM-DD format, empty string to remove",
          },
          status: {
            type: "string",
            description: "New status",
            enum: [...TASK_STATUSES],
          },
        },
        required: ["list_id", "task_id"],
      },
    },
    async (args) => {
      const params: Record<string, unknown> = {
        list_id: argString(args, "list_id"),
        task_id: argString(args, "task_id"),
      };
      for (const key of ["title", "description", "due_date", "status"]) {
        if (args[key] !== undefined && args[key] !== null) params[key] = argString(args, key);
      }
      return taskOperation(
        invoker,
        "update_task",
        params,
        "updating task",
        (title, id) => `Successfully updated task '${title}' (ID: ${id})`,
      );
    },
    { trackContext: taskContext },
  );

  const completeTask = defineTool(
    {
      name: "complete_task",
      description: "Mark a task as completed.",
      parameters: {
        type: "object",
        properties: { list_id: LIST_ID, task_id: TASK_ID },
        required: ["list_id", "task_id"],
      },
    },
    async (args) =>
      taskOperation(
        invoker,
        "complete_task",
        { list_id: argString(args, "list_id"), task_id: argString(args, "task_id") },
        "completing task",
        (title, id) => `Successfully completed task '${title}' (ID: ${id})`,
      ),
    { trackContext: taskContext },
  );

  const uncompleteTask = defineTool(
    {
      name: "uncomplete_task",
      description: "Mark a completed task as not started.",
      parameters: {
        type: "object",
        properties: { list_id: LIST_ID, task_id: TASK_ID },
        required: ["list_id", "task_id"],
      },
    },
    async (args) =>
      taskOperation(
        invoker,
        "uncomplete_task",
        { list_id: argString(args, "list_id"), task_id: argString(args, "task_id") },
        "marking task as not started",
        (title, id) => `Successfully marked task '${title}' as not started (ID: ${id})`,
      ),
    { trackContext: taskContext },
  );

  const deleteTask = defineTool(
    {
      name: "delete_task",
      description: "Delete a task from a task list.",
      parameters: {
        type: "object",
        properties: { list_id: LIST_ID, task_id: TASK_ID },
        required: ["list_id", "task_id"],
      },
    },
    async (args) => {
      const taskId = argString(args, "task_id");
      const result = await invoker.invoke("delete_task", {
        list_id: argString(args, "list_id"),
        task_id: taskId,
      });
      if (!result.success) return failure("deleting task", result.error);
      if (!succeeded(result.data)) return unconfirmed("deleting task");
      return `Successfully deleted task (ID: ${taskId})`;
    },
    { trackContext: listContext },
  );

  return [
    listTaskLists,
    createTaskList,
    deleteTaskList,
    listTasks,
    createTask,
    updateTask,
    completeTask,
    uncompleteTask,
    deleteTask,
  ];
}
