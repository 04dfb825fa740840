import type { WorkoutsView } from "../../../../src/helpers/view-helpers.js";
import { Card, Empty, Stat } from "../shared/cards.js";
import { BarChart, HorizontalBars, PieChart } from "../shared/charts.js";
import { formatLargeNumber, shortDate } from "../shared/format.js";
import { maxWidth } from "../../tokens.js";
import { WorkoutTable } from "./workout-table.js";

/** Days shown in the duration chart. */
const DURATION_DAYS = 14;

export function WorkoutsPanel({ data }: { data: WorkoutsView }) {
  const { workouts, history } = data;

  if (history.length === 0) {
    return <Empty>No workouts logged yet. Add one from the Add Records tab.</Empty>;
  }

  const chartWidth = maxWidth.widget - 40;

  return (
    <div>
      <div className="stat-grid">
        <Stat label="Workouts" value={workouts.total_workouts} />
        <Stat label="Calories burned" value={formatLargeNumber(workouts.total_calories)} />
        <Stat label="Minutes" value={formatLargeNumber(workouts.total_minutes)} />
      </div>

      <Card title="Calories by exercise">
        <HorizontalBars
          data={workouts.calories_by_exercise.map((e) => ({ label: e.exercise, value: e.calories, suffix: " kcal" }))}
          width={chartWidth}
        />
      </Card>

      <Card title="Minutes per day">
        <BarChart
          data={workouts.duration_by_day.slice(-DURATION_DAYS).map((d) => ({ label: shortDate(d.date), value: d.minutes }))}
          width={chartWidth}
          height={90}
        />
      </Card>

      <Card title="Intensity">
        {workouts.intensity.length > 0 ? (
          <PieChart data={workouts.intensity.map((i) => ({ label: i.intensity, value: i.count }))} />
        ) : (
          <Empty>No intensity recorded</Empty>
        )}
      </Card>

      <Card title="Sessions">
        <WorkoutTable sessions={history} />
      </Card>
    </div>
  );
}
