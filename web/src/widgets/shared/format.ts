export function formatKg(kg: number): string {
  return `${kg.toFixed(1)} kg`;
}

/** Signed value with one decimal, e.g. "+0.4 kg", "-1.5 kg". */
export function formatChange(value: number, unit: string): string {
  const sign = value > 0 ? "+" : "";
  return `${sign}${value.toFixed(1)} ${unit}`;
}

/** "2025-03-02" → "03/02" */
export function shortDate(isoDate: string): string {
  const [, month, day] = isoDate.split("-");
  return `${month}/${day}`;
}

/** "workouts_per_week" → "Workouts per week" */
export function humanize(key: string): string {
  const words = key.replace(/_/g, " ").trim();
  return words.charAt(0).toUpperCase() + words.slice(1);
}

export function formatLargeNumber(v: number): string {
  if (v >= 10000) return `${(v / 1000).toFixed(0)}k`;
  if (v >= 1000) return `${(v / 1000).toFixed(1)}k`;
  return v % 1 === 0 ? v.toString() : v.toFixed(1);
}
