import { describe, it, expect, vi, beforeEach } from "vitest";

const mocks = vi.hoisted(() => ({
  fetchUsers: vi.fn(),
  findUser: vi.fn(),
  fetchWeightHistory: vi.fn(),
  fetchWorkoutHistory: vi.fn(),
  fetchGoals: vi.fn(),
}));

vi.mock("../../db/queries.js", () => mocks);

import { registerDashboardTool } from "../dashboard.js";
import { DataAccessError } from "../../db/errors.js";
import { user, weight, session, goal } from "../../helpers/__tests__/fixtures.js";
import { captureTools, textOf } from "./tool-harness.js";

const users = [user(), user({ id: 2, username: "sam_okafor", email: "sam@example.com" })];

describe("show_dashboard tool", () => {
  const tools = captureTools(registerDashboardTool);
  const { handler } = tools.show_dashboard;

  beforeEach(() => {
    vi.resetAllMocks();
    mocks.fetchUsers.mockResolvedValue(users);
    mocks.findUser.mockResolvedValue(users[0]);
  });

  it("registers as a read-only view of the shared widget", () => {
    expect(tools.show_dashboard.config).toMatchObject({
      title: "Fitness Dashboard",
      annotations: { readOnlyHint: true },
      _meta: {
        ui: { resourceUri: "ui://fitness-dashboard/fitness.html" },
        "openai/outputTemplate": "ui://fitness-dashboard-oai/fitness.html",
      },
    });
  });

  it("summarizes weight, workouts and goals for the user", async () => {
    mocks.fetchWeightHistory.mockResolvedValue([weight(1, "2025-03-01", 70), weight(2, "2025-03-02", 68.5)]);
    mocks.fetchWorkoutHistory.mockResolvedValue([
      session({ id: 6, workout_date: "2025-03-26" }),
      session({ id: 5, workout_date: "2025-03-25", category: "Strength", exercise_name: "Squats", calories_burned: 120 }),
      session({ id: 4, workout_date: "2025-03-24" }),
      session({ id: 3, workout_date: "2025-03-23" }),
      session({ id: 2, workout_date: "2025-03-22" }),
      session({ id: 1, workout_date: "2025-03-21" }),
    ]);
    mocks.fetchGoals.mockResolvedValue([goal({ id: 1 }), goal({ id: 2, status: "completed" })]);

    const result = await handler({ user_id: 1 });

    expect(result.isError).toBeUndefined();
    expect(result.structuredContent).toMatchObject({
      view: "dashboard",
      user: { id: 1, username: "alex_rivera" },
      weight: { latest: { weight_kg: 68.5, recorded_date: "2025-03-02" }, net_change: -1.5 },
      workouts: {
        total_workouts: 6,
        total_calories: 1620,
        total_minutes: 180,
        by_category: [
          { category: "Cardio", count: 5 },
          { category: "Strength", count: 1 },
        ],
      },
      goals: { active: 1, total: 2 },
      recent_workouts: [{ id: 6 }, { id: 5 }, { id: 4 }, { id: 3 }, { id: 2 }],
    });
    expect(result.structuredContent?.users).toHaveLength(2);
    expect(textOf(result)).toBe(
      "dashboard view for alex_rivera displayed. The user can see all data visually. Do NOT describe, list, or summarize it in text.",
    );
    expect(mocks.fetchWeightHistory).toHaveBeenCalledWith(1);
  });

  it("renders explicit empty values for a user with no data", async () => {
    mocks.fetchWeightHistory.mockResolvedValue([]);
    mocks.fetchWorkoutHistory.mockResolvedValue([]);
    mocks.fetchGoals.mockResolvedValue([]);

    const result = await handler({ user_id: 1 });

    expect(result.structuredContent).toMatchObject({
      weight: { latest: null, extremes: null, average: null, net_change: 0, records: 0, series: [] },
      workouts: { total_workouts: 0, total_calories: 0, by_category: [] },
      goals: { active: 0, total: 0, goals: [] },
      recent_workouts: [],
    });
  });

  it("returns an error for an unknown user without loading metrics", async () => {
    mocks.findUser.mockResolvedValue(null);

    const result = await handler({ user_id: 42 });

    expect(result.isError).toBe(true);
    expect(result.structuredContent).toEqual({ error: "User 42 not found. Call list_users to see valid ids." });
    expect(mocks.fetchWeightHistory).not.toHaveBeenCalled();
  });

  it("reports an unreachable database as a retryable ConnectionFailed", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    mocks.fetchWeightHistory.mockResolvedValue([]);
    mocks.fetchGoals.mockResolvedValue([]);
    mocks.fetchWorkoutHistory.mockRejectedValue(
      new DataAccessError("ConnectionFailed", "fetchWorkoutHistory", Object.assign(new Error("refused"), { code: "ECONNREFUSED" })),
    );

    const result = await handler({ user_id: 1 });

    expect(result.isError).toBe(true);
    expect(result.structuredContent).toEqual({
      error: "Could not reach the database. Please try again in a moment.",
      kind: "ConnectionFailed",
      retryable: true,
    });
  });
});
