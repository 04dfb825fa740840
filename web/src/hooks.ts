import { useState, useCallback } from "react";
import { useAppContext } from "./app-context.js";

/** Output of the tool call that opened the widget, narrowed by `guard`. */
export function useToolOutput<T>(guard: (value: unknown) => value is T): T | null {
  const { toolOutput } = useAppContext();
  return guard(toolOutput) ? toolOutput : null;
}

/** The raw tool output, for reading error payloads that no guard accepts. */
export function useRawToolOutput(): unknown {
  return useAppContext().toolOutput;
}

/** Hook to call a tool on the MCP server (works in both MCP Apps and OpenAI hosts) */
export function useCallTool() {
  const { callTool: contextCallTool } = useAppContext();
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const callTool = useCallback(
    async (name: string, args: Record<string, unknown> = {}): Promise<unknown> => {
      setLoading(true);
      setError(null);
      try {
        return await contextCallTool(name, args);
      } catch (err) {
        console.error(`[widget] ${name} failed:`, err);
        setError(err instanceof Error ? err.message : "Unknown error");
        return null;
      } finally {
        setLoading(false);
      }
    },
    [contextCallTool],
  );

  return { callTool, loading, error };
}
