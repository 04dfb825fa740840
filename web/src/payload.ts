import type { ViewName, ViewPayload } from "../../src/helpers/view-helpers.js";

/** Navigation tabs, in display order, with the tool that renders each view. */
export const VIEW_TABS: ReadonlyArray<{ view: ViewName; label: string; tool: string }> = [
  { view: "dashboard", label: "Dashboard", tool: "show_dashboard" },
  { view: "weight", label: "Weight Tracking", tool: "show_weight_tracking" },
  { view: "workouts", label: "Workout Log", tool: "show_workout_log" },
  { view: "goals", label: "Goals", tool: "show_goals" },
  { view: "add_records", label: "Add Records", tool: "show_add_records" },
];

export function toolForView(view: ViewName): string {
  return VIEW_TABS.find((t) => t.view === view)?.tool ?? "show_dashboard";
}

export function isViewPayload(value: unknown): value is ViewPayload {
  return (
    typeof value === "object" &&
    value !== null &&
    "view" in value &&
    VIEW_TABS.some((t) => t.view === value.view) &&
    "user" in value &&
    "users" in value &&
    Array.isArray(value.users)
  );
}

/** The `error` field of a failed tool result, if there is one. */
export function errorMessage(value: unknown): string | null {
  if (typeof value === "object" && value !== null && "error" in value && typeof value.error === "string") {
    return value.error;
  }
  return null;
}
