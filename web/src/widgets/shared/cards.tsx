import type { ReactNode } from "react";
import { sp } from "../../tokens.js";

export function Card({ title, children }: { title: string; children: ReactNode }) {
  return (
    <section className="card" style={{ marginBottom: sp[6] }} aria-label={title}>
      <div className="card-title">{title}</div>
      {children}
    </section>
  );
}

interface StatProps {
  label: string;
  value: ReactNode;
  badge?: { text: string; tone: "success" | "danger" | "muted" };
}

export function Stat({ label, value, badge }: StatProps) {
  return (
    <div className="card">
      <div className="stat-value">{value}</div>
      <div className="stat-label">
        {label}
        {badge && (
          <span className={`badge badge-${badge.tone}`} style={{ marginLeft: sp[3] }}>
            {badge.text}
          </span>
        )}
      </div>
    </div>
  );
}

export function Empty({ children }: { children: ReactNode }) {
  return <div className="empty">{children}</div>;
}
