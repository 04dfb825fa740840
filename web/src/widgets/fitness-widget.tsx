import { useState, useCallback, useEffect } from "react";
import type { ViewName, ViewPayload } from "../../../src/helpers/view-helpers.js";
import { useCallTool, useRawToolOutput, useToolOutput } from "../hooks.js";
import { useAppContext } from "../app-context.js";
import { VIEW_TABS, errorMessage, isViewPayload, toolForView } from "../payload.js";
import { maxWidth } from "../tokens.js";
import { DashboardPanel } from "./panels/dashboard-panel.js";
import { WeightPanel } from "./panels/weight-panel.js";
import { WorkoutsPanel } from "./panels/workouts-panel.js";
import { GoalsPanel } from "./panels/goals-panel.js";
import { AddRecordsPanel } from "./panels/add-records-panel.js";

// ── Header: user picker + navigation ──

interface HeaderProps {
  payload: ViewPayload;
  busy: boolean;
  onOpen: (view: ViewName, userId: number) => void;
}

function Header({ payload, busy, onOpen }: HeaderProps) {
  return (
    <>
      <div className="header">
        <div className="title" style={{ marginBottom: 0 }}>
          Fitness Dashboard
        </div>
        <select
          className="form-input"
          aria-label="User"
          value={payload.user.id}
          disabled={busy}
          onChange={(e) => onOpen(payload.view, Number(e.target.value))}
        >
          {payload.users.map((u) => (
            <option key={u.id} value={u.id}>
              {u.username}
            </option>
          ))}
        </select>
      </div>
      <nav className="nav">
        {VIEW_TABS.map((tab) => (
          <button
            key={tab.view}
            className="nav-tab"
            aria-current={tab.view === payload.view ? "page" : undefined}
            disabled={busy}
            onClick={() => onOpen(tab.view, payload.user.id)}
          >
            {tab.label}
          </button>
        ))}
      </nav>
    </>
  );
}

// ── Main Widget ──

export function FitnessWidget() {
  const initial = useToolOutput(isViewPayload);
  const raw = useRawToolOutput();
  const { error: hostError } = useAppContext();
  const { callTool, loading, error: callError } = useCallTool();
  // Views opened from inside the widget replace the one the host rendered
  const [opened, setOpened] = useState<ViewPayload | null>(null);
  const [error, setError] = useState<string | null>(null);

  // A new result from the host wins over anything opened before it
  useEffect(() => {
    setOpened(null);
  }, [initial]);

  const open = useCallback(
    async (view: ViewName, userId: number) => {
      const result = await callTool(toolForView(view), { user_id: userId });
      if (isViewPayload(result)) {
        setOpened(result);
        setError(null);
      } else {
        setError(errorMessage(result) ?? "Could not load this view.");
      }
    },
    [callTool],
  );

  const payload = opened ?? initial;

  if (!payload) {
    const message = errorMessage(raw);
    if (message) return <div className="empty">{message}</div>;
    if (hostError) return <div className="empty">Could not connect to the host: {hostError.message}</div>;
    return <div className="loading">Loading...</div>;
  }

  const alert = error ?? callError;

  return (
    <div style={{ maxWidth: maxWidth.widget }}>
      <Header payload={payload} busy={loading} onOpen={(view, userId) => void open(view, userId)} />
      {alert && (
        <div className="alert" role="alert">
          {alert}
        </div>
      )}
      {payload.view === "dashboard" && <DashboardPanel data={payload} />}
      {payload.view === "weight" && <WeightPanel data={payload} />}
      {payload.view === "workouts" && <WorkoutsPanel data={payload} />}
      {payload.view === "goals" && <GoalsPanel data={payload} />}
      {payload.view === "add_records" && (
        <AddRecordsPanel data={payload} callTool={callTool} onSaved={() => void open("add_records", payload.user.id)} />
      )}
    </div>
  );
}
