/**
 * The parts of the OpenAI Apps SDK runtime (`window.openai`) the widget uses.
 * Present when the widget is rendered inside ChatGPT's sandboxed iframe.
 */

interface OpenAiCallToolResult {
  structuredContent?: unknown;
  content?: Array<{ type: string; text: string }>;
  _meta?: Record<string, unknown>;
}

interface OpenAiGlobals {
  toolOutput: unknown;
  toolInput: Record<string, unknown>;
  theme: "light" | "dark";
  locale: string;
  displayMode: "inline" | "pip" | "fullscreen";
  maxHeight: number;

  callTool(name: string, args: Record<string, unknown>): Promise<OpenAiCallToolResult>;
  notifyIntrinsicHeight(height: number): void;
}

interface OpenAiSetGlobalsEvent extends CustomEvent {
  detail: { globals: Partial<OpenAiGlobals> };
}

declare global {
  interface Window {
    openai?: OpenAiGlobals;
  }
  interface WindowEventMap {
    "openai:set_globals": OpenAiSetGlobalsEvent;
  }
}

export {};
