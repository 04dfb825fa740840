import { vi } from "vitest";
import type { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

export type ToolHandler = (args: Record<string, unknown>) => Promise<CallToolResult>;

export interface RegisteredTool {
  config: {
    title?: string;
    inputSchema?: Record<string, z.ZodTypeAny>;
    annotations?: Record<string, unknown>;
    _meta?: Record<string, unknown>;
  };
  handler: ToolHandler;
}

/** Runs a register* function against a stub server and collects the tools it registers. */
export function captureTools(register: (server: McpServer) => void): Record<string, RegisteredTool> {
  const tools: Record<string, RegisteredTool> = {};
  const server = {
    registerTool: vi.fn((name: string, config: RegisteredTool["config"], handler: ToolHandler) => {
      tools[name] = { config, handler };
    }),
  } as unknown as McpServer;
  register(server);
  return tools;
}

export function textOf(result: CallToolResult): string {
  const [block] = result.content;
  if (!block || block.type !== "text") {
    throw new Error("expected a text content block");
  }
  return block.text;
}
