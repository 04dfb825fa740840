import type { GoalsView } from "../../../../src/helpers/view-helpers.js";
import { Empty } from "../shared/cards.js";
import { humanize } from "../shared/format.js";
import { sp } from "../../tokens.js";

export function GoalsPanel({ data }: { data: GoalsView }) {
  const { goals } = data;

  if (goals.total === 0) return <Empty>No goals set for this user</Empty>;

  return (
    <div>
      <div className="stat-label" style={{ marginBottom: sp[4] }}>
        {goals.active} of {goals.total} goals active
      </div>
      {goals.goals.map((g) => (
        <section key={g.id} className="card" style={{ marginBottom: sp[4] }} aria-label={humanize(g.goal_type)}>
          <div className="header">
            <strong>{humanize(g.goal_type)}</strong>
            <span className={`badge ${g.status === "active" ? "badge-success" : "badge-muted"}`}>{g.status}</span>
          </div>
          <div
            className="progress"
            role="progressbar"
            aria-valuemin={0}
            aria-valuemax={100}
            aria-valuenow={g.display_pct}
          >
            <div className="progress-fill" style={{ width: `${g.display_pct}%` }} />
          </div>
          <div className="stat-label" style={{ marginTop: sp[2] }}>
            {g.current_value}
            {g.target_value !== null ? ` / ${g.target_value}` : ""} · {g.progress_pct}%
            {g.target_date ? ` · due ${g.target_date}` : ""}
          </div>
        </section>
      ))}
    </div>
  );
}
