import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { fetchWeightHistory } from "../db/queries.js";
import { safeHandler, widgetMeta, APP_CONTEXT } from "../helpers/tool-response.js";
import { bodyMassIndex, summarizeWeight } from "../helpers/metrics.js";
import { loadViewContext, userNotFound, viewResponse } from "../helpers/view-helpers.js";

export function registerWeightTool(server: McpServer) {
  server.registerTool(
    "show_weight_tracking",
    {
      title: "Weight Tracking",
      description: `${APP_CONTEXT}Display a user's weight history: latest, min, max, average, net change, BMI, a trend chart and the full record table.`,
      inputSchema: {
        user_id: z.number().int().positive().describe("User to show. Get ids from list_users."),
      },
      annotations: { readOnlyHint: true },
      _meta: widgetMeta("Loading weight history...", "Weight history loaded"),
    },
    safeHandler("show_weight_tracking", async ({ user_id }: { user_id: number }) => {
      const ctx = await loadViewContext(user_id);
      if (!ctx) return userNotFound(user_id);

      const records = await fetchWeightHistory(user_id);
      const weight = summarizeWeight(records);

      return viewResponse({
        view: "weight",
        ...ctx,
        weight,
        bmi: weight.latest ? bodyMassIndex(weight.latest.weight_kg, ctx.user.height_cm) : null,
        history: records,
      });
    }),
  );
}
