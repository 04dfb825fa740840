import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { fetchWorkoutHistory } from "../db/queries.js";
import { safeHandler, widgetMeta, APP_CONTEXT } from "../helpers/tool-response.js";
import { summarizeWorkouts } from "../helpers/metrics.js";
import { loadViewContext, userNotFound, viewResponse } from "../helpers/view-helpers.js";

export function registerWorkoutLogTool(server: McpServer) {
  server.registerTool(
    "show_workout_log",
    {
      title: "Workout Log",
      description: `${APP_CONTEXT}Display a user's workout sessions: totals, calories per exercise, minutes per day, intensity split and the session table (newest first).`,
      inputSchema: {
        user_id: z.number().int().positive().describe("User to show. Get ids from list_users."),
      },
      annotations: { readOnlyHint: true },
      _meta: widgetMeta("Loading workouts...", "Workouts loaded"),
    },
    safeHandler("show_workout_log", async ({ user_id }: { user_id: number }) => {
      const ctx = await loadViewContext(user_id);
      if (!ctx) return userNotFound(user_id);

      const sessions = await fetchWorkoutHistory(user_id);

      return viewResponse({
        view: "workouts",
        ...ctx,
        workouts: summarizeWorkouts(sessions),
        history: sessions,
      });
    }),
  );
}
