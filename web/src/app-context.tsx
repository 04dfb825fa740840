import {
  createContext,
  useContext,
  useState,
  useEffect,
  useSyncExternalStore,
  useCallback,
  type ReactNode,
} from "react";
import {
  useApp,
  useHostStyles,
} from "@modelcontextprotocol/ext-apps/react";
import type {} from "./types/openai.js";

// ---------------------------------------------------------------------------
// Shared context shape
// ---------------------------------------------------------------------------

export type CallTool = (name: string, args: Record<string, unknown>) => Promise<unknown>;

export interface AppContextValue {
  /** Set when the host connection could not be established. */
  error: Error | null;
  /** Parsed output of the tool call that opened the widget. */
  toolOutput: unknown;
  callTool: CallTool;
}

export const AppContext = createContext<AppContextValue>({
  error: null,
  toolOutput: null,
  callTool: async () => null,
});

function isOpenAiHost(): boolean {
  return typeof window !== "undefined" && window.openai != null;
}

// ---------------------------------------------------------------------------
// Tool result parsing (both hosts)
// ---------------------------------------------------------------------------

function isTextBlock(block: unknown): block is { type: "text"; text: string } {
  return (
    typeof block === "object" &&
    block !== null &&
    "type" in block &&
    block.type === "text" &&
    "text" in block &&
    typeof block.text === "string"
  );
}

/** structuredContent when present, else the first text block parsed as JSON. */
export function parseToolContent(result: unknown): unknown {
  if (typeof result !== "object" || result === null) return result;
  if ("structuredContent" in result && result.structuredContent) {
    return result.structuredContent;
  }
  if ("content" in result && Array.isArray(result.content)) {
    const textBlock = result.content.find(isTextBlock);
    if (textBlock) {
      try {
        return JSON.parse(textBlock.text);
      } catch {
        return textBlock.text;
      }
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// MCP Apps Provider
// ---------------------------------------------------------------------------

function McpAppsProvider({ children }: { children: ReactNode }) {
  const [toolOutput, setToolOutput] = useState<unknown>(null);

  const { app, isConnected, error } = useApp({
    appInfo: { name: "Fitness Dashboard", version: "1.0.0" },
    capabilities: {},
    onAppCreated: (created) => {
      created.ontoolresult = (params) => setToolOutput(parseToolContent(params));
    },
  });

  useHostStyles(app, isConnected ? app?.getHostContext() : null);

  const callTool = useCallback<CallTool>(
    async (name, args) => {
      if (!app) return null;
      const result = await app.callServerTool({ name, arguments: args });
      return parseToolContent(result);
    },
    [app],
  );

  return (
    <AppContext.Provider
      value={{ error, toolOutput, callTool }}
    >
      {children}
    </AppContext.Provider>
  );
}

// ---------------------------------------------------------------------------
// OpenAI Provider
// ---------------------------------------------------------------------------

function subscribeToOpenAi(onChange: () => void) {
  const handler = () => onChange();
  window.addEventListener("openai:set_globals", handler);
  return () => window.removeEventListener("openai:set_globals", handler);
}

function getOpenAiToolOutput(): unknown {
  return window.openai?.toolOutput ?? null;
}

function getOpenAiTheme(): "light" | "dark" {
  return window.openai?.theme ?? "light";
}

function OpenAiProvider({ children }: { children: ReactNode }) {
  const toolOutput = useSyncExternalStore(subscribeToOpenAi, getOpenAiToolOutput);
  const theme = useSyncExternalStore(subscribeToOpenAi, getOpenAiTheme);

  useEffect(() => {
    document.documentElement.style.colorScheme = theme;
  }, [theme]);

  // Report content height so the host sizes the iframe
  useEffect(() => {
    const openai = window.openai;
    if (!openai) return;

    const observer = new ResizeObserver((entries) => {
      for (const entry of entries) {
        openai.notifyIntrinsicHeight(Math.ceil(entry.borderBoxSize?.[0]?.blockSize ?? entry.target.scrollHeight));
      }
    });
    observer.observe(document.body);
    return () => observer.disconnect();
  }, []);

  const callTool = useCallback<CallTool>(async (name, args) => {
    if (!window.openai) return null;
    const result = await window.openai.callTool(name, args);
    return parseToolContent(result);
  }, []);

  return (
    <AppContext.Provider
      value={{
        error: null,
        toolOutput,
        callTool,
      }}
    >
      {children}
    </AppContext.Provider>
  );
}

export function AppProvider({ children }: { children: ReactNode }) {
  if (isOpenAiHost()) {
    return <OpenAiProvider>{children}</OpenAiProvider>;
  }
  return <McpAppsProvider>{children}</McpAppsProvider>;
}

export function useAppContext() {
  return useContext(AppContext);
}
