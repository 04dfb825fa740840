// Design tokens: JS constants for inline styles and SVG attributes.
// CSS variables handle light/dark theming; these are theme-independent values.

/** Spacing scale (px) */
export const sp = {
  1: 2, 2: 4, 3: 6, 4: 8, 6: 12, 8: 16,
} as const;

/** Font size (px) */
export const font = {
  "2xs": 9, xs: 10, sm: 11, base: 12,
} as const;

/** Widget max width */
export const maxWidth = { widget: 640 } as const;

/**
 * Categorical palette for pie slices and legends. Cycles when there are more
 * categories than colors.
 */
export const palette = [
  "#2563eb", "#16a34a", "#d97706", "#dc2626", "#7c3aed", "#0891b2", "#db2777", "#65a30d",
] as const;

export function paletteColor(index: number): string {
  return palette[index % palette.length];
}
