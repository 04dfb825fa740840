/** Reusable SVG chart components for the fitness widget */
import { font, paletteColor } from "../../tokens.js";
import { formatLargeNumber } from "./format.js";

export interface ChartDatum {
  label: string;
  value: number;
}

interface SparklineProps {
  data: number[];
  width?: number;
  height?: number;
  color?: string;
  showArea?: boolean;
  showDot?: boolean;
}

export function Sparkline({
  data,
  width = 200,
  height = 50,
  color = "var(--primary)",
  showArea = true,
  showDot = true,
}: SparklineProps) {
  if (data.length < 2) return null;

  const pad = 4;
  const dotR = 3;
  const w = width - pad * 2;
  const h = height - pad * 2;
  const min = data.reduce((m, v) => (v < m ? v : m), data[0]);
  const max = data.reduce((m, v) => (v > m ? v : m), data[0]);
  const range = max - min || 1;

  const points = data.map((v, i) => ({
    x: pad + (i / (data.length - 1)) * w,
    y: pad + h - ((v - min) / range) * h,
  }));

  const polyline = points.map((p) => `${p.x},${p.y}`).join(" ");
  const first = points[0];
  const last = points[points.length - 1];

  const areaPath = `M${first.x},${first.y} ${points
    .map((p) => `L${p.x},${p.y}`)
    .join(" ")} L${last.x},${pad + h} L${first.x},${pad + h} Z`;

  return (
    <svg width={width} height={height} style={{ display: "block" }} role="img" aria-label="trend">
      {showArea && <path d={areaPath} fill={color} opacity={0.1} />}
      <polyline
        points={polyline}
        fill="none"
        stroke={color}
        strokeWidth={2}
        strokeLinecap="round"
        strokeLinejoin="round"
      />
      {showDot && <circle cx={last.x} cy={last.y} r={dotR} fill={color} />}
    </svg>
  );
}

interface BarChartProps {
  data: ChartDatum[];
  width?: number;
  height?: number;
  color?: string;
  barRadius?: number;
}

export function BarChart({
  data,
  width = 200,
  height = 80,
  color = "var(--primary)",
  barRadius = 3,
}: BarChartProps) {
  if (data.length === 0) return null;

  const labelH = 16;
  const pad = 4;
  const chartH = height - labelH - pad;
  const max = maxValue(data) || 1;
  const gap = 3;
  const barW = Math.max(4, (width - pad * 2 - gap * (data.length - 1)) / data.length);

  return (
    <svg width={width} height={height} style={{ display: "block" }}>
      {data.map((d, i) => {
        const barH = Math.max(2, (d.value / max) * chartH);
        const x = pad + i * (barW + gap);
        const y = pad + chartH - barH;
        return (
          <g key={i}>
            <rect x={x} y={y} width={barW} height={barH} rx={barRadius} fill={color} opacity={0.75}>
              <title>{`${d.label}: ${formatLargeNumber(d.value)}`}</title>
            </rect>
            <text
              x={x + barW / 2}
              y={height - 2}
              textAnchor="middle"
              fontSize={font["2xs"]}
              fill="var(--text-secondary)"
              fontFamily="var(--font)"
            >
              {d.label}
            </text>
          </g>
        );
      })}
    </svg>
  );
}

interface HorizontalBarsProps {
  data: Array<ChartDatum & { suffix?: string }>;
  width?: number;
  rowHeight?: number;
  color?: string;
  barRadius?: number;
}

export function HorizontalBars({
  data,
  width = 260,
  rowHeight = 28,
  color = "var(--primary)",
  barRadius = 4,
}: HorizontalBarsProps) {
  if (data.length === 0) return null;

  const max = maxValue(data) || 1;
  const labelW = 100;
  const valueW = 50;
  const barArea = width - labelW - valueW;

  return (
    <svg width={width} height={data.length * rowHeight} style={{ display: "block" }}>
      {data.map((d, i) => {
        const barW = Math.max(2, (d.value / max) * barArea);
        const y = i * rowHeight;
        return (
          <g key={i}>
            <text
              x={labelW - 8}
              y={y + rowHeight / 2 + 1}
              textAnchor="end"
              fontSize={font.sm}
              fill="var(--text)"
              fontFamily="var(--font)"
              dominantBaseline="middle"
            >
              {truncateLabel(d.label)}
            </text>
            <rect
              x={labelW}
              y={y + 6}
              width={barW}
              height={rowHeight - 12}
              rx={barRadius}
              fill={color}
              opacity={0.7}
            />
            <text
              x={labelW + barW + 6}
              y={y + rowHeight / 2 + 1}
              fontSize={font.xs}
              fontWeight={600}
              fill="var(--text-secondary)"
              fontFamily="var(--font)"
              dominantBaseline="middle"
            >
              {formatLargeNumber(d.value)}
              {d.suffix ?? ""}
            </text>
          </g>
        );
      })}
    </svg>
  );
}

interface PieChartProps {
  data: ChartDatum[];
  size?: number;
}

export interface PieSlice extends ChartDatum {
  color: string;
  /** Share of the total, 0–1. */
  fraction: number;
  path: string;
}

/** Slice geometry for a pie of radius `r` centred on (r, r), starting at 12 o'clock. */
export function pieSlices(data: ChartDatum[], r: number): PieSlice[] {
  const items = data.filter((d) => d.value > 0);
  const total = items.reduce((sum, d) => sum + d.value, 0);
  if (total === 0) return [];

  let angle = -Math.PI / 2;
  return items.map((d, i) => {
    const fraction = d.value / total;
    const start = angle;
    angle += fraction * 2 * Math.PI;
    const x1 = r + r * Math.cos(start);
    const y1 = r + r * Math.sin(start);
    const x2 = r + r * Math.cos(angle);
    const y2 = r + r * Math.sin(angle);
    const largeArc = fraction > 0.5 ? 1 : 0;
    // A single slice is a full circle; an arc with equal endpoints draws nothing
    const path =
      items.length === 1
        ? `M${r},0 A${r},${r} 0 1 1 ${r - 0.01},0 Z`
        : `M${r},${r} L${x1},${y1} A${r},${r} 0 ${largeArc} 1 ${x2},${y2} Z`;
    return { ...d, color: paletteColor(i), fraction, path };
  });
}

export function PieChart({ data, size = 120 }: PieChartProps) {
  const slices = pieSlices(data, size / 2);
  if (slices.length === 0) return null;

  return (
    <div style={{ display: "flex", alignItems: "center", gap: 16 }}>
      <svg width={size} height={size} style={{ display: "block", flexShrink: 0 }}>
        {slices.map((s) => (
          <path key={s.label} d={s.path} fill={s.color} stroke="var(--bg)" strokeWidth={1}>
            <title>{`${s.label}: ${s.value}`}</title>
          </path>
        ))}
      </svg>
      <ul style={{ listStyle: "none", margin: 0, padding: 0, fontSize: font.sm }}>
        {slices.map((s) => (
          <li key={s.label} style={{ display: "flex", alignItems: "center", gap: 6, marginBottom: 3 }}>
            <span style={{ width: 8, height: 8, borderRadius: 2, background: s.color }} />
            <span>{s.label}</span>
            <span style={{ color: "var(--text-secondary)" }}>
              {s.value} ({Math.round(s.fraction * 100)}%)
            </span>
          </li>
        ))}
      </ul>
    </div>
  );
}

function maxValue(data: ChartDatum[]): number {
  return data.reduce((m, d) => (d.value > m ? d.value : m), 0);
}

function truncateLabel(label: string): string {
  return label.length > 14 ? label.slice(0, 12) + ".." : label;
}
