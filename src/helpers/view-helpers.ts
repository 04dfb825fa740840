import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { fetchUsers, findUser } from "../db/queries.js";
import type { ExerciseTypeRow, IntensityLevel, UserRow, WeightRecordRow, WorkoutSessionRow } from "../db/types.js";
import type { GoalSummary, WeightSummary, WorkoutSummary } from "./metrics.js";
import { toolResponse, widgetResponse } from "./tool-response.js";

// ─── Payloads rendered by the widget ───────────────────────────────────────

export type ViewName = "dashboard" | "weight" | "workouts" | "goals" | "add_records";

interface ViewBase {
  view: ViewName;
  user: UserRow;
  /** Full user list, for the identity picker. */
  users: UserRow[];
}

export interface DashboardView extends ViewBase {
  view: "dashboard";
  weight: WeightSummary;
  workouts: WorkoutSummary;
  goals: GoalSummary;
  recent_workouts: WorkoutSessionRow[];
}

export interface WeightView extends ViewBase {
  view: "weight";
  weight: WeightSummary;
  bmi: number | null;
  history: WeightRecordRow[];
}

export interface WorkoutsView extends ViewBase {
  view: "workouts";
  workouts: WorkoutSummary;
  history: WorkoutSessionRow[];
}

export interface GoalsView extends ViewBase {
  view: "goals";
  goals: GoalSummary;
}

export interface AddRecordsView extends ViewBase {
  view: "add_records";
  exercise_types: ExerciseTypeRow[];
  intensity_levels: readonly IntensityLevel[];
  today: string;
}

export type ViewPayload = DashboardView | WeightView | WorkoutsView | GoalsView | AddRecordsView;

// ─── Helpers ───────────────────────────────────────────────────────────────

/** Selected user plus the full list, or null when the id is unknown. */
export async function loadViewContext(userId: number): Promise<{ user: UserRow; users: UserRow[] } | null> {
  const [user, users] = await Promise.all([findUser(userId), fetchUsers()]);
  return user ? { user, users } : null;
}

export function userNotFound(userId: number): CallToolResult {
  return toolResponse({ error: `User ${userId} not found. Call list_users to see valid ids.` }, true);
}

export function viewResponse(payload: ViewPayload): CallToolResult {
  return widgetResponse(
    `${payload.view} view for ${payload.user.username} displayed. The user can see all data visually. Do NOT describe, list, or summarize it in text.`,
    { ...payload },
  );
}
