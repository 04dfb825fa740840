import type { WorkoutSessionRow } from "../../../../src/db/types.js";
import { Empty } from "../shared/cards.js";

export function WorkoutTable({ sessions }: { sessions: WorkoutSessionRow[] }) {
  if (sessions.length === 0) return <Empty>No workouts logged yet</Empty>;

  return (
    <table className="table">
      <thead>
        <tr>
          <th>Date</th>
          <th>Exercise</th>
          <th>Min</th>
          <th>kcal</th>
          <th>Intensity</th>
        </tr>
      </thead>
      <tbody>
        {sessions.map((s) => (
          <tr key={s.id}>
            <td>{s.workout_date}</td>
            <td>{s.exercise_name}</td>
            <td>{s.duration_minutes}</td>
            <td>{s.calories_burned}</td>
            <td>{s.intensity_level ?? "–"}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
}
