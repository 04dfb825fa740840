import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { DataAccessError } from "../db/errors.js";

/**
 * Standard prefix injected into every tool description so the LLM
 * always has app context regardless of which tool it reads first.
 */
export const APP_CONTEXT = `[Fitness Dashboard — weight, workout and goal tracking for a small set of users.
Every view is scoped to one user: call list_users first when you do not know the user_id.
Data tools return JSON (no UI). View tools (show_*) render the dashboard widget — do NOT repeat widget data in text.]

`;

/** Widget resource shared by every view tool. */
export const WIDGET_URI = "ui://fitness-dashboard/fitness.html";
export const OPENAI_WIDGET_URI = "ui://fitness-dashboard-oai/fitness.html";

/** `_meta` for a tool that renders the widget, for both MCP Apps and OpenAI hosts. */
export function widgetMeta(invoking: string, invoked: string) {
  return {
    ui: { resourceUri: WIDGET_URI },
    "openai/outputTemplate": OPENAI_WIDGET_URI,
    "openai/widgetAccessible": true,
    "openai/toolInvocation/invoking": invoking,
    "openai/toolInvocation/invoked": invoked,
  };
}

/**
 * Build data tool responses: full JSON in content (model needs to see it),
 * mirrored in structuredContent for widgets that call the tool.
 */
export function toolResponse(data: Record<string, unknown>, isError?: boolean): CallToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(data) }],
    structuredContent: data,
    ...(isError ? { isError: true } : {}),
  };
}

/**
 * Build widget tool responses: brief instruction for LLM, full data for widget.
 * - content: short message telling the LLM what was displayed (DO NOT repeat in response)
 * - structuredContent: full data the widget renders visually
 */
export function widgetResponse(llmNote: string, data: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: "text" as const, text: llmNote }],
    structuredContent: data,
  };
}

export interface ClassifiedError {
  message: string;
  kind?: DataAccessError["kind"];
  retryable: boolean;
}

/**
 * Classifies an error and returns a user-facing message.
 * `retryable` tells the caller whether the same call can succeed later.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err instanceof DataAccessError) {
    switch (err.kind) {
      case "ConnectionFailed":
        return { message: "Could not reach the database. Please try again in a moment.", kind: err.kind, retryable: true };
      case "WriteFailed":
        return { message: writeFailureMessage(err.code), kind: err.kind, retryable: false };
      case "QueryFailed":
        return { message: "Could not load the requested data.", kind: err.kind, retryable: false };
    }
  }

  if (!(err instanceof Error)) {
    return { message: "An unexpected error occurred. Please try again.", retryable: true };
  }

  const msg = err.message.toLowerCase();
  if (msg.includes("timeout") || msg.includes("timed out")) {
    return { message: "The operation timed out. Please try again.", retryable: true };
  }
  if (msg.includes("invalid") || msg.includes("must be") || msg.includes("required") || msg.includes("not found")) {
    return { message: err.message, retryable: false };
  }

  return { message: "Something went wrong. Please try again.", retryable: true };
}

function writeFailureMessage(code: string | undefined): string {
  switch (code) {
    case "23503":
      return "Referenced user or exercise not found.";
    case "23502":
      return "Required field is missing.";
    case "23514":
      return "A value is out of the allowed range.";
    default:
      return "The record could not be saved.";
  }
}

/**
 * Wraps a tool handler with try/catch error handling.
 * On failure, logs the error and returns a structured error response
 * instead of letting the error reach the MCP framework.
 */
export function safeHandler<T>(
  toolName: string,
  handler: (params: T) => Promise<CallToolResult>,
): (params: T) => Promise<CallToolResult> {
  return async (params: T) => {
    try {
      return await handler(params);
    } catch (err) {
      const code = err instanceof DataAccessError ? err.code : undefined;
      console.error(
        `[${toolName}] Unhandled error${code ? ` (${code})` : ""}:`,
        err instanceof Error ? err.stack : err,
      );
      const { message, kind, retryable } = classifyError(err);
      return toolResponse({ error: message, ...(kind ? { kind } : {}), retryable }, true);
    }
  };
}
