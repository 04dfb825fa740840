import type { QueryResultRow } from "pg";
import pool from "./connection.js";
import { DataAccessError, isConnectionError } from "./errors.js";
import type {
  UserRow,
  WeightRecordRow,
  WorkoutSessionRow,
  GoalRow,
  ExerciseTypeRow,
  NewWeightRecord,
  NewWorkoutSession,
} from "./types.js";

type QueryParam = string | number | null;

// Date columns are cast to text so they arrive as YYYY-MM-DD instead of
// a Date shifted into the server's timezone.
const WEIGHT_COLUMNS = `id, user_id, weight_kg::float8 AS weight_kg,
  recorded_date::text AS recorded_date, notes`;

const WORKOUT_COLUMNS = `ws.id, ws.user_id, ws.exercise_type_id,
  et.name AS exercise_name, et.category,
  ws.duration_minutes, COALESCE(ws.calories_burned, 0) AS calories_burned,
  ws.intensity_level, ws.workout_date::text AS workout_date, ws.notes`;

async function read<T extends QueryResultRow>(
  operation: string,
  sql: string,
  params: QueryParam[] = [],
): Promise<T[]> {
  try {
    const { rows } = await pool.query<T>(sql, params);
    return rows;
  } catch (err) {
    throw new DataAccessError(isConnectionError(err) ? "ConnectionFailed" : "QueryFailed", operation, err);
  }
}

async function write<T extends QueryResultRow>(
  operation: string,
  sql: string,
  params: QueryParam[],
): Promise<T> {
  let rows: T[];
  try {
    ({ rows } = await pool.query<T>(sql, params));
  } catch (err) {
    throw new DataAccessError(isConnectionError(err) ? "ConnectionFailed" : "WriteFailed", operation, err);
  }
  const [row] = rows;
  if (!row) {
    throw new DataAccessError("WriteFailed", operation, new Error("no row returned"));
  }
  return row;
}

// ─── Reads ─────────────────────────────────────────────────────────────────

export function fetchUsers(): Promise<UserRow[]> {
  return read<UserRow>(
    "fetchUsers",
    `SELECT id, username, email, age, height_cm::float8 AS height_cm
     FROM users ORDER BY id`,
  );
}

export async function findUser(userId: number): Promise<UserRow | null> {
  const rows = await read<UserRow>(
    "findUser",
    `SELECT id, username, email, age, height_cm::float8 AS height_cm
     FROM users WHERE id = $1`,
    [userId],
  );
  return rows[0] ?? null;
}

/** Weight history, oldest first. */
export function fetchWeightHistory(userId: number): Promise<WeightRecordRow[]> {
  return read<WeightRecordRow>(
    "fetchWeightHistory",
    `SELECT ${WEIGHT_COLUMNS}
     FROM weight_records
     WHERE user_id = $1
     ORDER BY recorded_date ASC, id ASC`,
    [userId],
  );
}

/** Workout sessions joined with their exercise type, newest first. */
export function fetchWorkoutHistory(userId: number): Promise<WorkoutSessionRow[]> {
  return read<WorkoutSessionRow>(
    "fetchWorkoutHistory",
    `SELECT ${WORKOUT_COLUMNS}
     FROM workout_sessions ws
     JOIN exercise_types et ON et.id = ws.exercise_type_id
     WHERE ws.user_id = $1
     ORDER BY ws.workout_date DESC, ws.id DESC`,
    [userId],
  );
}

export function fetchGoals(userId: number): Promise<GoalRow[]> {
  return read<GoalRow>(
    "fetchGoals",
    `SELECT id, user_id, goal_type,
            target_value::float8 AS target_value,
            COALESCE(current_value, 0)::float8 AS current_value,
            target_date::text AS target_date,
            COALESCE(status, 'active') AS status
     FROM goals
     WHERE user_id = $1
     ORDER BY target_date ASC NULLS LAST, id ASC`,
    [userId],
  );
}

export function fetchExerciseTypes(): Promise<ExerciseTypeRow[]> {
  return read<ExerciseTypeRow>(
    "fetchExerciseTypes",
    `SELECT id, name, category, calories_per_minute::float8 AS calories_per_minute
     FROM exercise_types
     ORDER BY name`,
  );
}

// ─── Writes ────────────────────────────────────────────────────────────────

export function insertWeightRecord(record: NewWeightRecord): Promise<WeightRecordRow> {
  return write<WeightRecordRow>(
    "insertWeightRecord",
    `INSERT INTO weight_records (user_id, weight_kg, recorded_date, notes)
     VALUES ($1, $2, $3, $4)
     RETURNING ${WEIGHT_COLUMNS}`,
    [record.userId, record.weightKg, record.recordedDate, record.notes],
  );
}

/**
 * Inserts a session and returns it joined with its exercise type, in one
 * statement so the write stays atomic.
 */
export function insertWorkoutSession(session: NewWorkoutSession): Promise<WorkoutSessionRow> {
  return write<WorkoutSessionRow>(
    "insertWorkoutSession",
    `WITH ws AS (
       INSERT INTO workout_sessions
         (user_id, exercise_type_id, duration_minutes, calories_burned, intensity_level, workout_date, notes)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING *
     )
     SELECT ${WORKOUT_COLUMNS}
     FROM ws
     JOIN exercise_types et ON et.id = ws.exercise_type_id`,
    [
      session.userId,
      session.exerciseTypeId,
      session.durationMinutes,
      session.caloriesBurned,
      session.intensityLevel,
      session.workoutDate,
      session.notes,
    ],
  );
}
