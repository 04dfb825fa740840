import type { GoalRow, UserRow, WeightRecordRow, WorkoutSessionRow } from "../../db/types.js";

export function user(overrides: Partial<UserRow> = {}): UserRow {
  return { id: 1, username: "alex_rivera", email: "alex@example.com", age: 29, height_cm: 176, ...overrides };
}

export function weight(id: number, recorded_date: string, weight_kg: number, user_id = 1): WeightRecordRow {
  return { id, user_id, weight_kg, recorded_date, notes: null };
}

export function session(overrides: Partial<WorkoutSessionRow> = {}): WorkoutSessionRow {
  return {
    id: 1,
    user_id: 1,
    exercise_type_id: 1,
    exercise_name: "Running",
    category: "Cardio",
    duration_minutes: 30,
    calories_burned: 300,
    intensity_level: "medium",
    workout_date: "2025-03-20",
    notes: null,
    ...overrides,
  };
}

export function goal(overrides: Partial<GoalRow> = {}): GoalRow {
  return {
    id: 1,
    user_id: 1,
    goal_type: "weight_loss",
    target_value: 75,
    current_value: 80,
    target_date: "2025-09-30",
    status: "active",
    ...overrides,
  };
}
