import {
  INTENSITY_LEVELS,
  type GoalRow,
  type IntensityLevel,
  type IsoDate,
  type WeightRecordRow,
  type WorkoutSessionRow,
} from "../db/types.js";

/**
 * Metrics over already-loaded tables. Every function here is pure: it never
 * mutates its input and returns an explicit empty value (0, [] or null) for
 * empty tables so callers can branch before rendering.
 */

export const UNCATEGORIZED = "Uncategorized";

type WeightPoint = Pick<WeightRecordRow, "weight_kg" | "recorded_date">;
type GoalValues = Pick<GoalRow, "current_value" | "target_value">;

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Stable copy sorted by date; equal dates keep their input order. */
function byDate<T extends WeightPoint>(records: readonly T[]): T[] {
  return [...records].sort((a, b) => a.recorded_date.localeCompare(b.recorded_date));
}

// ─── Weight ────────────────────────────────────────────────────────────────

export function latestWeight<T extends WeightPoint>(records: readonly T[]): T | null {
  const sorted = byDate(records);
  return sorted.length > 0 ? sorted[sorted.length - 1] : null;
}

export function weightExtremes(records: readonly WeightPoint[]): { min: number; max: number } | null {
  if (records.length === 0) return null;
  let min = records[0].weight_kg;
  let max = min;
  for (const r of records) {
    if (r.weight_kg < min) min = r.weight_kg;
    if (r.weight_kg > max) max = r.weight_kg;
  }
  return { min, max };
}

/** Last weight minus first weight in date order; 0 with fewer than two records. */
export function weightNetChange(records: readonly WeightPoint[]): number {
  if (records.length < 2) return 0;
  const sorted = byDate(records);
  return round(sorted[sorted.length - 1].weight_kg - sorted[0].weight_kg, 2);
}

export function averageWeight(records: readonly WeightPoint[]): number | null {
  if (records.length === 0) return null;
  const total = records.reduce((sum, r) => sum + r.weight_kg, 0);
  return round(total / records.length, 2);
}

/** Body mass index, kg / m². Null when height is unknown. */
export function bodyMassIndex(weightKg: number, heightCm: number | null): number | null {
  if (heightCm === null || heightCm <= 0 || weightKg <= 0) return null;
  const meters = heightCm / 100;
  return round(weightKg / (meters * meters), 1);
}

// ─── Workouts ──────────────────────────────────────────────────────────────

export function totalWorkouts(sessions: readonly WorkoutSessionRow[]): number {
  return sessions.length;
}

export function totalCaloriesBurned(sessions: readonly Pick<WorkoutSessionRow, "calories_burned">[]): number {
  return sessions.reduce((sum, s) => sum + s.calories_burned, 0);
}

export function totalDuration(sessions: readonly Pick<WorkoutSessionRow, "duration_minutes">[]): number {
  return sessions.reduce((sum, s) => sum + s.duration_minutes, 0);
}

export interface CategoryCount {
  category: string;
  count: number;
}

/** Session count per exercise category, in order of first appearance. */
export function workoutsByCategory(sessions: readonly Pick<WorkoutSessionRow, "category">[]): CategoryCount[] {
  const counts = new Map<string, number>();
  for (const s of sessions) {
    const category = s.category || UNCATEGORIZED;
    counts.set(category, (counts.get(category) ?? 0) + 1);
  }
  return Array.from(counts, ([category, count]) => ({ category, count }));
}

export interface ExerciseCalories {
  exercise: string;
  calories: number;
}

/** Calories summed per exercise, smallest first (horizontal bar order). */
export function caloriesByExercise(
  sessions: readonly Pick<WorkoutSessionRow, "exercise_name" | "calories_burned">[],
): ExerciseCalories[] {
  const sums = new Map<string, number>();
  for (const s of sessions) {
    sums.set(s.exercise_name, (sums.get(s.exercise_name) ?? 0) + s.calories_burned);
  }
  return Array.from(sums, ([exercise, calories]) => ({ exercise, calories })).sort(
    (a, b) => a.calories - b.calories || a.exercise.localeCompare(b.exercise),
  );
}

export interface DayDuration {
  date: IsoDate;
  minutes: number;
}

export function durationByDay(
  sessions: readonly Pick<WorkoutSessionRow, "workout_date" | "duration_minutes">[],
): DayDuration[] {
  const sums = new Map<IsoDate, number>();
  for (const s of sessions) {
    sums.set(s.workout_date, (sums.get(s.workout_date) ?? 0) + s.duration_minutes);
  }
  return Array.from(sums, ([date, minutes]) => ({ date, minutes })).sort((a, b) =>
    a.date.localeCompare(b.date),
  );
}

export interface IntensityCount {
  intensity: IntensityLevel;
  count: number;
}

/** Count per intensity, low → high; levels with no sessions are omitted. */
export function intensityDistribution(
  sessions: readonly Pick<WorkoutSessionRow, "intensity_level">[],
): IntensityCount[] {
  return INTENSITY_LEVELS.map((intensity) => ({
    intensity,
    count: sessions.filter((s) => s.intensity_level === intensity).length,
  })).filter((c) => c.count > 0);
}

/**
 * Suggested calories for a session from the catalog's per-minute rate.
 * Null when the exercise has no reference rate.
 */
export function estimateCalories(durationMinutes: number, caloriesPerMinute: number | null): number | null {
  if (caloriesPerMinute === null || caloriesPerMinute < 0 || durationMinutes <= 0) return null;
  return Math.round(durationMinutes * caloriesPerMinute);
}

// ─── Goals ─────────────────────────────────────────────────────────────────

export function activeGoalCount(goals: readonly Pick<GoalRow, "status">[]): number {
  return goals.filter((g) => g.status === "active").length;
}

/** current / target × 100, or 0 when there is no positive target. Not clamped. */
export function goalProgressPercent(goal: GoalValues): number {
  if (goal.target_value === null || goal.target_value <= 0) return 0;
  return (goal.current_value / goal.target_value) * 100;
}

export function clampPercent(value: number): number {
  return Math.min(100, Math.max(0, value));
}

// ─── View Summaries ────────────────────────────────────────────────────────

export interface WeightSummary {
  latest: { weight_kg: number; recorded_date: IsoDate } | null;
  extremes: { min: number; max: number } | null;
  average: number | null;
  net_change: number;
  records: number;
  series: Array<{ date: IsoDate; weight_kg: number }>;
}

export function summarizeWeight(records: readonly WeightRecordRow[]): WeightSummary {
  const latest = latestWeight(records);
  return {
    latest: latest ? { weight_kg: latest.weight_kg, recorded_date: latest.recorded_date } : null,
    extremes: weightExtremes(records),
    average: averageWeight(records),
    net_change: weightNetChange(records),
    records: records.length,
    series: byDate(records).map((r) => ({ date: r.recorded_date, weight_kg: r.weight_kg })),
  };
}

export interface WorkoutSummary {
  total_workouts: number;
  total_calories: number;
  total_minutes: number;
  by_category: CategoryCount[];
  calories_by_exercise: ExerciseCalories[];
  duration_by_day: DayDuration[];
  intensity: IntensityCount[];
}

export function summarizeWorkouts(sessions: readonly WorkoutSessionRow[]): WorkoutSummary {
  return {
    total_workouts: totalWorkouts(sessions),
    total_calories: totalCaloriesBurned(sessions),
    total_minutes: totalDuration(sessions),
    by_category: workoutsByCategory(sessions),
    calories_by_exercise: caloriesByExercise(sessions),
    duration_by_day: durationByDay(sessions),
    intensity: intensityDistribution(sessions),
  };
}

export interface GoalProgress extends GoalRow {
  /** Raw percentage, may exceed 100. */
  progress_pct: number;
  /** Percentage clamped to [0, 100] for progress bars. */
  display_pct: number;
}

export interface GoalSummary {
  active: number;
  total: number;
  goals: GoalProgress[];
}

export function summarizeGoals(goals: readonly GoalRow[]): GoalSummary {
  return {
    active: activeGoalCount(goals),
    total: goals.length,
    goals: goals.map((g) => {
      const pct = round(goalProgressPercent(g), 1);
      return { ...g, progress_pct: pct, display_pct: clampPercent(pct) };
    }),
  };
}
