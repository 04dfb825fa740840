import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  fetchExerciseTypes,
  fetchWeightHistory,
  findUser,
  insertWeightRecord,
  insertWorkoutSession,
} from "../db/queries.js";
import { INTENSITY_LEVELS, type IntensityLevel } from "../db/types.js";
import { toolResponse, safeHandler, widgetMeta, APP_CONTEXT } from "../helpers/tool-response.js";
import { estimateCalories } from "../helpers/metrics.js";
import { getCurrentDate, isIsoDate } from "../helpers/date-helpers.js";
import { LIMITS } from "../helpers/limits.js";
import { loadViewContext, userNotFound, viewResponse } from "../helpers/view-helpers.js";

const userIdParam = z.number().int().positive().describe("User the record belongs to. Get ids from list_users.");
const dateParam = z
  .string()
  .refine(isIsoDate, "must be a date in YYYY-MM-DD format")
  .optional()
  .describe("Date as YYYY-MM-DD. Defaults to today");
const notesParam = z.string().max(LIMITS.maxNotesLength).optional().describe("Optional free-text note");

interface LogWeightParams {
  user_id: number;
  weight_kg: number;
  recorded_date?: string;
  notes?: string;
}

interface LogWorkoutParams {
  user_id: number;
  exercise_type_id: number;
  duration_minutes: number;
  calories_burned?: number;
  intensity_level: IntensityLevel;
  workout_date?: string;
  notes?: string;
}

function cleanNotes(notes: string | undefined): string | null {
  const trimmed = notes?.trim();
  return trimmed ? trimmed : null;
}

export function registerAddRecordsTools(server: McpServer) {
  server.registerTool(
    "show_add_records",
    {
      title: "Add Records",
      description: `${APP_CONTEXT}Display the entry forms for a user: a weight entry (weight, date, note) and a workout entry (exercise, duration, calories, intensity, date, note). Use this when the user wants to enter data themselves; use log_weight / log_workout to record values they told you.`,
      inputSchema: {
        user_id: userIdParam,
      },
      annotations: { readOnlyHint: true },
      _meta: widgetMeta("Opening forms...", "Forms ready"),
    },
    safeHandler("show_add_records", async ({ user_id }: { user_id: number }) => {
      const ctx = await loadViewContext(user_id);
      if (!ctx) return userNotFound(user_id);

      const exerciseTypes = await fetchExerciseTypes();

      return viewResponse({
        view: "add_records",
        ...ctx,
        exercise_types: exerciseTypes,
        intensity_levels: INTENSITY_LEVELS,
        today: getCurrentDate(),
      });
    }),
  );

  server.registerTool(
    "log_weight",
    {
      title: "Log Weight",
      description: `${APP_CONTEXT}Append a weight record for a user.

Examples:
- "I weighed 72.4 this morning" → weight_kg: 72.4
- "log 80kg for last Monday" → weight_kg: 80, recorded_date: that Monday`,
      inputSchema: {
        user_id: userIdParam,
        weight_kg: z.number().positive().max(LIMITS.maxWeightKg).describe("Body weight in kg"),
        recorded_date: dateParam,
        notes: notesParam,
      },
      annotations: {},
    },
    safeHandler("log_weight", async ({ user_id, weight_kg, recorded_date, notes }: LogWeightParams) => {
      const user = await findUser(user_id);
      if (!user) return userNotFound(user_id);

      const record = await insertWeightRecord({
        userId: user_id,
        weightKg: weight_kg,
        recordedDate: recorded_date ?? getCurrentDate(),
        notes: cleanNotes(notes),
      });

      // Compare with the closest earlier record
      const history = await fetchWeightHistory(user_id);
      const previous = history
        .filter((r) => r.id !== record.id && r.recorded_date <= record.recorded_date)
        .at(-1);

      return toolResponse({
        success: true,
        record,
        ...(previous
          ? {
              previous: {
                weight_kg: previous.weight_kg,
                recorded_date: previous.recorded_date,
                change: Math.round((record.weight_kg - previous.weight_kg) * 100) / 100,
              },
            }
          : {}),
      });
    }),
  );

  server.registerTool(
    "log_workout",
    {
      title: "Log Workout",
      description: `${APP_CONTEXT}Append a workout session for a user. exercise_type_id comes from the exercise catalog shown by show_add_records.
If calories_burned is omitted it is estimated from the exercise's calories-per-minute rate.`,
      inputSchema: {
        user_id: userIdParam,
        exercise_type_id: z.number().int().positive().describe("Exercise type id from the catalog"),
        duration_minutes: z.number().int().min(1).max(LIMITS.maxDurationMinutes).describe("Duration in minutes"),
        calories_burned: z.number().int().min(0).max(LIMITS.maxCalories).optional().describe("Calories burned. Estimated when omitted"),
        intensity_level: z.enum(INTENSITY_LEVELS).describe("low, medium or high"),
        workout_date: dateParam,
        notes: notesParam,
      },
      annotations: {},
    },
    safeHandler("log_workout", async (params: LogWorkoutParams) => {
      const [user, exerciseTypes] = await Promise.all([findUser(params.user_id), fetchExerciseTypes()]);
      if (!user) return userNotFound(params.user_id);

      const exercise = exerciseTypes.find((e) => e.id === params.exercise_type_id);
      if (!exercise) {
        return toolResponse({ error: `Exercise type ${params.exercise_type_id} not found` }, true);
      }

      const estimated = params.calories_burned === undefined;
      const caloriesBurned =
        params.calories_burned ?? estimateCalories(params.duration_minutes, exercise.calories_per_minute) ?? 0;

      const session = await insertWorkoutSession({
        userId: params.user_id,
        exerciseTypeId: exercise.id,
        durationMinutes: params.duration_minutes,
        caloriesBurned,
        intensityLevel: params.intensity_level,
        workoutDate: params.workout_date ?? getCurrentDate(),
        notes: cleanNotes(params.notes),
      });

      return toolResponse({ success: true, session, calories_estimated: estimated });
    }),
  );
}
