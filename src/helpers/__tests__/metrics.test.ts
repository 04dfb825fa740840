import { describe, it, expect } from "vitest";
import {
  latestWeight,
  weightExtremes,
  weightNetChange,
  averageWeight,
  bodyMassIndex,
  totalWorkouts,
  totalCaloriesBurned,
  totalDuration,
  workoutsByCategory,
  caloriesByExercise,
  durationByDay,
  intensityDistribution,
  estimateCalories,
  activeGoalCount,
  goalProgressPercent,
  clampPercent,
  summarizeWeight,
  summarizeWorkouts,
  summarizeGoals,
} from "../metrics.js";
import { weight, session, goal } from "./fixtures.js";

describe("latestWeight", () => {
  it("returns the record with the latest date regardless of input order", () => {
    const records = [
      weight(1, "2025-03-09", 80.9),
      weight(2, "2025-03-02", 81.4),
      weight(3, "2025-03-16", 80.6),
    ];
    expect(latestWeight(records)?.id).toBe(3);
  });

  it("picks the later entry when two share a date", () => {
    const records = [weight(1, "2025-03-02", 80), weight(2, "2025-03-02", 79.5)];
    expect(latestWeight(records)?.id).toBe(2);
  });

  it("returns null for an empty history", () => {
    expect(latestWeight([])).toBeNull();
  });
});

describe("weightExtremes", () => {
  it("returns min and max by value", () => {
    const records = [
      weight(1, "2025-03-02", 81.4),
      weight(2, "2025-03-09", 80.9),
      weight(3, "2025-03-16", 80.0),
      weight(4, "2025-03-23", 80.6),
    ];
    expect(weightExtremes(records)).toEqual({ min: 80, max: 81.4 });
  });

  it("bounds every value in the sequence", () => {
    const sequences = [
      [72.5],
      [64.2, 64.5, 63.9],
      [90.3, 89.6, 91.1, 88.8, 90],
    ];
    for (const values of sequences) {
      const records = values.map((v, i) => weight(i + 1, `2025-01-${String(i + 10)}`, v));
      const extremes = weightExtremes(records);
      expect(extremes).not.toBeNull();
      for (const v of values) {
        expect(extremes?.min).toBeLessThanOrEqual(v);
        expect(extremes?.max).toBeGreaterThanOrEqual(v);
      }
    }
  });

  it("returns null for an empty history", () => {
    expect(weightExtremes([])).toBeNull();
  });

  it("handles a history too long to spread into an argument list", () => {
    const records = Array.from({ length: 200_000 }, (_, i) => weight(i + 1, "2025-01-01", 60 + (i % 40)));
    records.push(weight(200_001, "2025-01-02", 55.5));
    expect(weightExtremes(records)).toEqual({ min: 55.5, max: 99 });
  });
});

describe("weightNetChange", () => {
  it("subtracts the first weight from the last", () => {
    const records = [weight(1, "2025-03-01", 70.0), weight(2, "2025-03-02", 68.5)];
    expect(weightNetChange(records)).toBe(-1.5);
  });

  it("orders by date before subtracting", () => {
    const records = [weight(2, "2025-03-02", 68.5), weight(1, "2025-03-01", 70.0)];
    expect(weightNetChange(records)).toBe(-1.5);
  });

  it("rounds away floating point noise", () => {
    const records = [weight(1, "2025-03-02", 81.4), weight(2, "2025-03-23", 80.0)];
    expect(weightNetChange(records)).toBe(-1.4);
  });

  it("is zero with fewer than two records", () => {
    expect(weightNetChange([])).toBe(0);
    expect(weightNetChange([weight(1, "2025-03-01", 70)])).toBe(0);
  });

  it("does not reorder the caller's array", () => {
    const records = [weight(2, "2025-03-02", 68.5), weight(1, "2025-03-01", 70.0)];
    weightNetChange(records);
    expect(records.map((r) => r.id)).toEqual([2, 1]);
  });
});

describe("averageWeight", () => {
  it("averages to two decimals", () => {
    const records = [
      weight(1, "2025-03-01", 70),
      weight(2, "2025-03-02", 68.5),
      weight(3, "2025-03-03", 71),
    ];
    expect(averageWeight(records)).toBe(69.83);
  });

  it("returns null for an empty history", () => {
    expect(averageWeight([])).toBeNull();
  });
});

describe("bodyMassIndex", () => {
  it("computes kg / m² to one decimal", () => {
    // 80 / 1.76² = 25.826
    expect(bodyMassIndex(80, 176)).toBe(25.8);
  });

  it("returns null without a usable height", () => {
    expect(bodyMassIndex(80, null)).toBeNull();
    expect(bodyMassIndex(80, 0)).toBeNull();
  });
});

describe("workout totals", () => {
  it("are zero for an empty log", () => {
    expect(totalWorkouts([])).toBe(0);
    expect(totalCaloriesBurned([])).toBe(0);
    expect(totalDuration([])).toBe(0);
  });

  it("count sessions and sum calories and minutes", () => {
    const sessions = [
      session({ id: 1, calories_burned: 400, duration_minutes: 35 }),
      session({ id: 2, calories_burned: 105, duration_minutes: 15 }),
      session({ id: 3, calories_burned: 0, duration_minutes: 10 }),
    ];
    expect(totalWorkouts(sessions)).toBe(3);
    expect(totalCaloriesBurned(sessions)).toBe(505);
    expect(totalDuration(sessions)).toBe(60);
  });
});

describe("workoutsByCategory", () => {
  it("counts sessions per category and buckets missing ones", () => {
    const sessions = [
      session({ id: 1, category: "Cardio" }),
      session({ id: 2, category: "Strength" }),
      session({ id: 3, category: "Cardio" }),
      session({ id: 4, category: null }),
    ];
    expect(workoutsByCategory(sessions)).toEqual([
      { category: "Cardio", count: 2 },
      { category: "Strength", count: 1 },
      { category: "Uncategorized", count: 1 },
    ]);
  });

  it("returns an empty list for an empty log", () => {
    expect(workoutsByCategory([])).toEqual([]);
  });
});

describe("caloriesByExercise", () => {
  it("sums per exercise and orders ascending by total", () => {
    const sessions = [
      session({ id: 1, exercise_name: "Run", calories_burned: 300 }),
      session({ id: 2, exercise_name: "Run", calories_burned: 200 }),
      session({ id: 3, exercise_name: "Swim", calories_burned: 150 }),
    ];
    expect(caloriesByExercise(sessions)).toEqual([
      { exercise: "Swim", calories: 150 },
      { exercise: "Run", calories: 500 },
    ]);
  });

  it("breaks ties by name", () => {
    const sessions = [
      session({ id: 1, exercise_name: "Squats", calories_burned: 120 }),
      session({ id: 2, exercise_name: "Cycling", calories_burned: 120 }),
    ];
    expect(caloriesByExercise(sessions).map((e) => e.exercise)).toEqual(["Cycling", "Squats"]);
  });
});

describe("durationByDay", () => {
  it("sums minutes per date in ascending date order", () => {
    const sessions = [
      session({ id: 1, workout_date: "2025-03-21", duration_minutes: 20 }),
      session({ id: 2, workout_date: "2025-03-20", duration_minutes: 30 }),
      session({ id: 3, workout_date: "2025-03-21", duration_minutes: 15 }),
    ];
    expect(durationByDay(sessions)).toEqual([
      { date: "2025-03-20", minutes: 30 },
      { date: "2025-03-21", minutes: 35 },
    ]);
  });
});

describe("intensityDistribution", () => {
  it("counts levels from low to high and skips absent ones", () => {
    const sessions = [
      session({ id: 1, intensity_level: "high" }),
      session({ id: 2, intensity_level: "low" }),
      session({ id: 3, intensity_level: "high" }),
      session({ id: 4, intensity_level: null }),
    ];
    expect(intensityDistribution(sessions)).toEqual([
      { intensity: "low", count: 1 },
      { intensity: "high", count: 2 },
    ]);
  });

  it("returns an empty list for an empty log", () => {
    expect(intensityDistribution([])).toEqual([]);
  });
});

describe("estimateCalories", () => {
  it("multiplies duration by the catalog rate", () => {
    expect(estimateCalories(30, 11.5)).toBe(345);
  });

  it("rounds to whole calories", () => {
    // 25 * 6.5 = 162.5
    expect(estimateCalories(25, 6.5)).toBe(163);
  });

  it("returns null when the rate is unknown", () => {
    expect(estimateCalories(30, null)).toBeNull();
  });
});

describe("goals", () => {
  it("counts only active goals", () => {
    const goals = [
      goal({ id: 1, status: "active" }),
      goal({ id: 2, status: "active" }),
      goal({ id: 3, status: "completed" }),
    ];
    expect(activeGoalCount(goals)).toBe(2);
  });

  it("treats a zero target as 0% progress", () => {
    expect(goalProgressPercent({ current_value: 50, target_value: 0 })).toBe(0);
  });

  it("treats a missing target as 0% progress", () => {
    expect(goalProgressPercent({ current_value: 50, target_value: null })).toBe(0);
  });

  it("computes current / target without clamping", () => {
    expect(goalProgressPercent({ current_value: 3, target_value: 4 })).toBe(75);
    expect(goalProgressPercent({ current_value: 6, target_value: 4 })).toBe(150);
  });

  it("does not mutate the goal", () => {
    const g = goal({ current_value: 3, target_value: 4 });
    goalProgressPercent(g);
    expect(g).toEqual(goal({ current_value: 3, target_value: 4 }));
  });

  it("clamps display percentages to [0, 100]", () => {
    expect(clampPercent(-5)).toBe(0);
    expect(clampPercent(42.5)).toBe(42.5);
    expect(clampPercent(150)).toBe(100);
  });
});

describe("summaries", () => {
  it("summarizes an empty weight history with explicit empty values", () => {
    expect(summarizeWeight([])).toEqual({
      latest: null,
      extremes: null,
      average: null,
      net_change: 0,
      records: 0,
      series: [],
    });
  });

  it("summarizes a weight history in date order", () => {
    const summary = summarizeWeight([weight(2, "2025-03-02", 68.5), weight(1, "2025-03-01", 70.0)]);
    expect(summary).toEqual({
      latest: { weight_kg: 68.5, recorded_date: "2025-03-02" },
      extremes: { min: 68.5, max: 70 },
      average: 69.25,
      net_change: -1.5,
      records: 2,
      series: [
        { date: "2025-03-01", weight_kg: 70 },
        { date: "2025-03-02", weight_kg: 68.5 },
      ],
    });
  });

  it("summarizes an empty workout log", () => {
    expect(summarizeWorkouts([])).toEqual({
      total_workouts: 0,
      total_calories: 0,
      total_minutes: 0,
      by_category: [],
      calories_by_exercise: [],
      duration_by_day: [],
      intensity: [],
    });
  });

  it("adds raw and clamped progress to each goal", () => {
    const summary = summarizeGoals([
      goal({ id: 1, current_value: 80, target_value: 75 }),
      goal({ id: 2, current_value: 50, target_value: 0, status: "completed" }),
    ]);
    expect(summary.active).toBe(1);
    expect(summary.total).toBe(2);
    expect(summary.goals.map((g) => [g.progress_pct, g.display_pct])).toEqual([
      [106.7, 100],
      [0, 0],
    ]);
  });
});
