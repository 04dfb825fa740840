import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { fetchWeightHistory, fetchWorkoutHistory, fetchGoals } from "../db/queries.js";
import { safeHandler, widgetMeta, APP_CONTEXT } from "../helpers/tool-response.js";
import { summarizeGoals, summarizeWeight, summarizeWorkouts } from "../helpers/metrics.js";
import { loadViewContext, userNotFound, viewResponse } from "../helpers/view-helpers.js";

const RECENT_WORKOUTS = 5;

export function registerDashboardTool(server: McpServer) {
  server.registerTool(
    "show_dashboard",
    {
      title: "Fitness Dashboard",
      description: `${APP_CONTEXT}Display the overview for one user: latest weight and net change, workout and calorie totals, active goals, weight trend and workouts by category. The widget shows all data visually — do NOT repeat it in your response. Just confirm it's displayed or offer next steps.`,
      inputSchema: {
        user_id: z.number().int().positive().describe("User to show. Get ids from list_users."),
      },
      annotations: { readOnlyHint: true },
      _meta: widgetMeta("Loading dashboard...", "Dashboard loaded"),
    },
    safeHandler("show_dashboard", async ({ user_id }: { user_id: number }) => {
      const ctx = await loadViewContext(user_id);
      if (!ctx) return userNotFound(user_id);

      const [weights, sessions, goals] = await Promise.all([
        fetchWeightHistory(user_id),
        fetchWorkoutHistory(user_id),
        fetchGoals(user_id),
      ]);

      return viewResponse({
        view: "dashboard",
        ...ctx,
        weight: summarizeWeight(weights),
        workouts: summarizeWorkouts(sessions),
        goals: summarizeGoals(goals),
        // history is newest first
        recent_workouts: sessions.slice(0, RECENT_WORKOUTS),
      });
    }),
  );
}
