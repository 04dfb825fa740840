import type { DashboardView } from "../../../../src/helpers/view-helpers.js";
import { Card, Empty, Stat } from "../shared/cards.js";
import { PieChart, Sparkline } from "../shared/charts.js";
import { formatChange, formatKg, formatLargeNumber } from "../shared/format.js";
import { maxWidth } from "../../tokens.js";
import { WorkoutTable } from "./workout-table.js";

export function DashboardPanel({ data }: { data: DashboardView }) {
  const { weight, workouts, goals } = data;

  return (
    <div>
      <div className="stat-grid">
        <Stat label="Latest weight" value={weight.latest ? formatKg(weight.latest.weight_kg) : "–"} />
        <Stat label="Net change" value={weight.records > 1 ? formatChange(weight.net_change, "kg") : "–"} />
        <Stat label="Workouts" value={workouts.total_workouts} />
        <Stat label="Calories burned" value={formatLargeNumber(workouts.total_calories)} />
        <Stat label="Active goals" value={goals.active} />
      </div>

      <Card title="Weight trend">
        {weight.series.length >= 2 ? (
          <Sparkline data={weight.series.map((p) => p.weight_kg)} width={maxWidth.widget - 40} height={70} />
        ) : (
          <Empty>Log at least two weights to see a trend</Empty>
        )}
      </Card>

      <Card title="Workouts by category">
        {workouts.by_category.length > 0 ? (
          <PieChart data={workouts.by_category.map((c) => ({ label: c.category, value: c.count }))} />
        ) : (
          <Empty>No workouts logged yet</Empty>
        )}
      </Card>

      <Card title="Recent workouts">
        <WorkoutTable sessions={data.recent_workouts} />
      </Card>
    </div>
  );
}
