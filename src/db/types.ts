/**
 * Row types for the fitness dashboard.
 * Each interface matches the column list of one query in queries.ts, so the
 * shape handed to the metrics layer is checked at compile time.
 */

// ─── Core Types ────────────────────────────────────────────────────────────

export const INTENSITY_LEVELS = ["low", "medium", "high"] as const;
export type IntensityLevel = (typeof INTENSITY_LEVELS)[number];

/** Calendar date as stored, `YYYY-MM-DD`. */
export type IsoDate = string;

// ─── Seeded Tables ─────────────────────────────────────────────────────────

export interface UserRow {
  id: number;
  username: string;
  email: string;
  age: number | null;
  height_cm: number | null;
}

export interface ExerciseTypeRow {
  id: number;
  name: string;
  category: string | null;
  calories_per_minute: number | null;
}

// ─── Records ───────────────────────────────────────────────────────────────

export interface WeightRecordRow {
  id: number;
  user_id: number;
  weight_kg: number;
  recorded_date: IsoDate;
  notes: string | null;
}

/** Workout session joined with its exercise type. */
export interface WorkoutSessionRow {
  id: number;
  user_id: number;
  exercise_type_id: number;
  exercise_name: string;
  category: string | null;
  duration_minutes: number;
  calories_burned: number;
  intensity_level: IntensityLevel | null;
  workout_date: IsoDate;
  notes: string | null;
}

export interface GoalRow {
  id: number;
  user_id: number;
  goal_type: string;
  target_value: number | null;
  current_value: number;
  target_date: IsoDate | null;
  /** "active" for goals in progress; anything else counts as closed. */
  status: string;
}

// ─── Insert Shapes ─────────────────────────────────────────────────────────

export interface NewWeightRecord {
  userId: number;
  weightKg: number;
  recordedDate: IsoDate;
  notes: string | null;
}

export interface NewWorkoutSession {
  userId: number;
  exerciseTypeId: number;
  durationMinutes: number;
  caloriesBurned: number;
  intensityLevel: IntensityLevel;
  workoutDate: IsoDate;
  notes: string | null;
}
