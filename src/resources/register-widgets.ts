import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  registerAppResource,
  RESOURCE_MIME_TYPE,
} from "@modelcontextprotocol/ext-apps/server";
import fs from "node:fs/promises";
import path from "node:path";

import type { McpUiResourceMeta } from "@modelcontextprotocol/ext-apps";
import { WIDGET_URI, OPENAI_WIDGET_URI } from "../helpers/tool-response.js";

/** MIME type for OpenAI/ChatGPT widget resources */
const OPENAI_MIME = "text/html+skybridge";

/** MCP Apps UI metadata (Claude Desktop / claude.ai) */
const MCP_UI_META: McpUiResourceMeta = {
  csp: {},
  domain: "fitness-dashboard",
};

/** OpenAI widget metadata (ChatGPT): flat "openai/" prefixed keys */
const OAI_META: Record<string, unknown> = {
  "openai/widgetCSP": { connect_domains: [], resource_domains: [] },
  "openai/widgetDomain": "fitness-dashboard",
};

const WIDGET = {
  name: "fitness-widget",
  file: "fitness.html",
  description: "Fitness dashboard: overview, weight tracking, workout log, goals and entry forms",
};

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/** Read widget HTML from dist, returning a fallback page if it is not built */
export function readWidgetFile(filePath: string, nodeEnv: string) {
  return async (): Promise<string> => {
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (err) {
      if (!isMissingFile(err)) throw err;
      console.error(`[Widget] File not found: ${filePath}. Run: npm run build:web`);
      if (nodeEnv === "production") {
        return `<!DOCTYPE html><html><body><p style="font-family:system-ui;color:#666;padding:2rem;text-align:center">This feature is temporarily unavailable. Please try again later.</p></body></html>`;
      }
      return `<!DOCTYPE html><html><body><p>Widget not built. Run: npm run build:web</p></body></html>`;
    }
  };
}

/**
 * Register the widget resource on the MCP server, twice:
 *   1. MCP Apps (Claude Desktop / claude.ai): `text/html;profile=mcp-app`
 *   2. OpenAI (ChatGPT): `text/html+skybridge`
 * Hosts only request the URI their protocol specifies; the other is ignored.
 */
export function registerWidgetResources(server: McpServer, opts: { distDir: string; nodeEnv: string }) {
  const getHtml = readWidgetFile(path.join(opts.distDir, WIDGET.file), opts.nodeEnv);

  registerAppResource(
    server,
    WIDGET.name,
    WIDGET_URI,
    {
      mimeType: RESOURCE_MIME_TYPE,
      description: WIDGET.description,
      _meta: { ui: MCP_UI_META },
    },
    async () => {
      const html = await getHtml();
      return {
        contents: [
          {
            uri: WIDGET_URI,
            mimeType: RESOURCE_MIME_TYPE,
            text: html,
          },
        ],
      };
    }
  );

  // Same HTML, different MIME type and URI namespace
  server.resource(
    `${WIDGET.name}-oai`,
    OPENAI_WIDGET_URI,
    { mimeType: OPENAI_MIME, description: WIDGET.description, _meta: OAI_META },
    async () => {
      const html = await getHtml();
      return {
        contents: [
          {
            uri: OPENAI_WIDGET_URI,
            mimeType: OPENAI_MIME,
            text: html,
            _meta: OAI_META,
          },
        ],
      };
    }
  );
}
