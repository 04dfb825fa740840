import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { fetchGoals } from "../db/queries.js";
import { safeHandler, widgetMeta, APP_CONTEXT } from "../helpers/tool-response.js";
import { summarizeGoals } from "../helpers/metrics.js";
import { loadViewContext, userNotFound, viewResponse } from "../helpers/view-helpers.js";

export function registerGoalsTool(server: McpServer) {
  server.registerTool(
    "show_goals",
    {
      title: "Goals",
      description: `${APP_CONTEXT}Display a user's goals with progress toward each target and the number still active. Goals are read-only.`,
      inputSchema: {
        user_id: z.number().int().positive().describe("User to show. Get ids from list_users."),
      },
      annotations: { readOnlyHint: true },
      _meta: widgetMeta("Loading goals...", "Goals loaded"),
    },
    safeHandler("show_goals", async ({ user_id }: { user_id: number }) => {
      const ctx = await loadViewContext(user_id);
      if (!ctx) return userNotFound(user_id);

      const goals = await fetchGoals(user_id);

      return viewResponse({ view: "goals", ...ctx, goals: summarizeGoals(goals) });
    }),
  );
}
