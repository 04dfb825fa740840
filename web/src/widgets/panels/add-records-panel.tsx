import { useState, type FormEvent, type ReactNode } from "react";
import type { AddRecordsView } from "../../../../src/helpers/view-helpers.js";
import type { IntensityLevel } from "../../../../src/db/types.js";
import { estimateCalories } from "../../../../src/helpers/metrics.js";
import { LIMITS } from "../../../../src/helpers/limits.js";
import type { CallTool } from "../../app-context.js";
import { errorMessage } from "../../payload.js";
import { Card, Empty } from "../shared/cards.js";

type Status = { tone: "ok" | "error"; text: string } | null;

function Field({ id, label, children }: { id: string; label: string; children: ReactNode }) {
  return (
    <div className="form-group">
      <label className="form-label" htmlFor={id}>
        {label}
      </label>
      {children}
    </div>
  );
}

function StatusLine({ status }: { status: Status }) {
  if (!status) return null;
  return status.tone === "ok" ? (
    <div className="notice" role="status">
      {status.text}
    </div>
  ) : (
    <div className="alert" role="alert">
      {status.text}
    </div>
  );
}

interface FormProps {
  data: AddRecordsView;
  callTool: CallTool;
  onSaved: () => void;
}

function WeightForm({ data, callTool, onSaved }: FormProps) {
  const [weightKg, setWeightKg] = useState("");
  const [date, setDate] = useState(data.today);
  const [notes, setNotes] = useState("");
  const [saving, setSaving] = useState(false);
  const [status, setStatus] = useState<Status>(null);

  const onSubmit = async (e: FormEvent<HTMLFormElement>) => {
    e.preventDefault();
    const value = Number(weightKg);
    if (!weightKg || !(value > 0) || value > LIMITS.maxWeightKg) {
      setStatus({ tone: "error", text: `Weight must be between 0 and ${LIMITS.maxWeightKg} kg` });
      return;
    }

    setSaving(true);
    const result = await callTool("log_weight", {
      user_id: data.user.id,
      weight_kg: value,
      recorded_date: date,
      ...(notes.trim() ? { notes } : {}),
    });
    setSaving(false);

    const error = errorMessage(result);
    if (error || result === null) {
      setStatus({ tone: "error", text: error ?? "Could not save the weight" });
      return;
    }
    setStatus({ tone: "ok", text: `Saved ${value} kg for ${date}` });
    setWeightKg("");
    setNotes("");
    onSaved();
  };

  return (
    <form aria-label="Weight entry" onSubmit={(e) => void onSubmit(e)}>
      <Field id="weight-kg" label="Weight (kg)">
        <input
          id="weight-kg"
          className="form-input"
          type="number"
          step="0.1"
          min="0"
          max={LIMITS.maxWeightKg}
          value={weightKg}
          onChange={(e) => setWeightKg(e.target.value)}
        />
      </Field>
      <Field id="weight-date" label="Date">
        <input id="weight-date" className="form-input" type="date" value={date} onChange={(e) => setDate(e.target.value)} />
      </Field>
      <Field id="weight-notes" label="Notes">
        <input
          id="weight-notes"
          className="form-input"
          maxLength={LIMITS.maxNotesLength}
          value={notes}
          onChange={(e) => setNotes(e.target.value)}
        />
      </Field>
      <StatusLine status={status} />
      <button className="btn" type="submit" disabled={saving}>
        {saving ? "Saving..." : "Log weight"}
      </button>
    </form>
  );
}

function WorkoutForm({ data, callTool, onSaved }: FormProps) {
  const [exerciseId, setExerciseId] = useState(data.exercise_types[0]?.id ?? 0);
  const [duration, setDuration] = useState("");
  const [calories, setCalories] = useState("");
  const [caloriesEdited, setCaloriesEdited] = useState(false);
  const [intensity, setIntensity] = useState<IntensityLevel>("medium");
  const [date, setDate] = useState(data.today);
  const [notes, setNotes] = useState("");
  const [saving, setSaving] = useState(false);
  const [status, setStatus] = useState<Status>(null);

  const exercise = data.exercise_types.find((t) => t.id === exerciseId);
  const estimate = exercise ? estimateCalories(Number(duration), exercise.calories_per_minute) : null;
  // Follows the estimate until the user types their own value
  const caloriesValue = caloriesEdited ? calories : estimate !== null ? String(estimate) : "";

  const onSubmit = async (e: FormEvent<HTMLFormElement>) => {
    e.preventDefault();
    const minutes = Number(duration);
    if (!Number.isInteger(minutes) || minutes < 1 || minutes > LIMITS.maxDurationMinutes) {
      setStatus({ tone: "error", text: `Duration must be a whole number from 1 to ${LIMITS.maxDurationMinutes}` });
      return;
    }
    // An untouched estimate is left for the server to compute
    const kcal = caloriesEdited && calories !== "" ? Number(calories) : undefined;
    if (kcal !== undefined && (!Number.isInteger(kcal) || kcal < 0 || kcal > LIMITS.maxCalories)) {
      setStatus({ tone: "error", text: `Calories must be a whole number from 0 to ${LIMITS.maxCalories}` });
      return;
    }

    setSaving(true);
    const result = await callTool("log_workout", {
      user_id: data.user.id,
      exercise_type_id: exerciseId,
      duration_minutes: minutes,
      ...(kcal !== undefined ? { calories_burned: kcal } : {}),
      intensity_level: intensity,
      workout_date: date,
      ...(notes.trim() ? { notes } : {}),
    });
    setSaving(false);

    const error = errorMessage(result);
    if (error || result === null) {
      setStatus({ tone: "error", text: error ?? "Could not save the workout" });
      return;
    }
    setStatus({ tone: "ok", text: `Saved ${exercise?.name ?? "workout"} on ${date}` });
    setDuration("");
    setCalories("");
    setCaloriesEdited(false);
    setNotes("");
    onSaved();
  };

  return (
    <form aria-label="Workout entry" onSubmit={(e) => void onSubmit(e)}>
      <Field id="workout-exercise" label="Exercise">
        <select
          id="workout-exercise"
          className="form-input"
          value={exerciseId}
          onChange={(e) => setExerciseId(Number(e.target.value))}
        >
          {data.exercise_types.map((t) => (
            <option key={t.id} value={t.id}>
              {t.name}
              {t.category ? ` (${t.category})` : ""}
            </option>
          ))}
        </select>
      </Field>
      <Field id="workout-duration" label="Duration (min)">
        <input
          id="workout-duration"
          className="form-input"
          type="number"
          min="1"
          max={LIMITS.maxDurationMinutes}
          value={duration}
          onChange={(e) => setDuration(e.target.value)}
        />
      </Field>
      <Field id="workout-calories" label="Calories">
        <input
          id="workout-calories"
          className="form-input"
          type="number"
          min="0"
          max={LIMITS.maxCalories}
          value={caloriesValue}
          onChange={(e) => {
            setCalories(e.target.value);
            setCaloriesEdited(true);
          }}
        />
      </Field>
      <Field id="workout-intensity" label="Intensity">
        <select
          id="workout-intensity"
          className="form-input"
          value={intensity}
          onChange={(e) => {
            const level = data.intensity_levels.find((l) => l === e.target.value);
            if (level) setIntensity(level);
          }}
        >
          {data.intensity_levels.map((l) => (
            <option key={l} value={l}>
              {l}
            </option>
          ))}
        </select>
      </Field>
      <Field id="workout-date" label="Date">
        <input id="workout-date" className="form-input" type="date" value={date} onChange={(e) => setDate(e.target.value)} />
      </Field>
      <Field id="workout-notes" label="Notes">
        <input
          id="workout-notes"
          className="form-input"
          maxLength={LIMITS.maxNotesLength}
          value={notes}
          onChange={(e) => setNotes(e.target.value)}
        />
      </Field>
      <StatusLine status={status} />
      <button className="btn" type="submit" disabled={saving}>
        {saving ? "Saving..." : "Log workout"}
      </button>
    </form>
  );
}

export function AddRecordsPanel({ data, callTool, onSaved }: FormProps) {
  return (
    <div>
      <Card title="Weight">
        <WeightForm data={data} callTool={callTool} onSaved={onSaved} />
      </Card>
      <Card title="Workout">
        {data.exercise_types.length > 0 ? (
          <WorkoutForm data={data} callTool={callTool} onSaved={onSaved} />
        ) : (
          <Empty>The exercise catalog is empty</Empty>
        )}
      </Card>
    </div>
  );
}
