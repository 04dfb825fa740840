import type { WeightView } from "../../../../src/helpers/view-helpers.js";
import { Card, Empty, Stat } from "../shared/cards.js";
import { Sparkline } from "../shared/charts.js";
import { formatChange, formatKg, shortDate } from "../shared/format.js";
import { font, maxWidth } from "../../tokens.js";

export function WeightPanel({ data }: { data: WeightView }) {
  const { weight, bmi, history } = data;

  if (history.length === 0) {
    return <Empty>No weight records yet. Add one from the Add Records tab.</Empty>;
  }

  const first = weight.series[0];
  const last = weight.series[weight.series.length - 1];
  // Table reads newest first
  const rows = [...history].reverse();

  return (
    <div>
      <div className="stat-grid">
        <Stat label="Latest" value={weight.latest ? formatKg(weight.latest.weight_kg) : "–"} />
        <Stat label="Lowest" value={weight.extremes ? formatKg(weight.extremes.min) : "–"} />
        <Stat label="Highest" value={weight.extremes ? formatKg(weight.extremes.max) : "–"} />
        <Stat label="Average" value={weight.average !== null ? formatKg(weight.average) : "–"} />
        <Stat
          label="Change"
          value={formatChange(weight.net_change, "kg")}
          badge={
            weight.net_change === 0
              ? undefined
              : { text: weight.net_change < 0 ? "down" : "up", tone: weight.net_change < 0 ? "success" : "danger" }
          }
        />
        <Stat label="BMI" value={bmi ?? "–"} />
      </div>

      <Card title="Weight over time">
        {weight.series.length >= 2 ? (
          <>
            <Sparkline data={weight.series.map((p) => p.weight_kg)} width={maxWidth.widget - 40} height={120} />
            <div
              style={{
                display: "flex",
                justifyContent: "space-between",
                fontSize: font.xs,
                color: "var(--text-secondary)",
              }}
            >
              <span>{shortDate(first.date)}</span>
              <span>{shortDate(last.date)}</span>
            </div>
          </>
        ) : (
          <Empty>Log at least two weights to see a trend</Empty>
        )}
      </Card>

      <Card title="History">
        <table className="table">
          <thead>
            <tr>
              <th>Date</th>
              <th>Weight</th>
              <th>Notes</th>
            </tr>
          </thead>
          <tbody>
            {rows.map((r) => (
              <tr key={r.id}>
                <td>{r.recorded_date}</td>
                <td>{formatKg(r.weight_kg)}</td>
                <td>{r.notes ?? ""}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </Card>
    </div>
  );
}
