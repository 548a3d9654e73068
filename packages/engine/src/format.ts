/** Render a number for rationale lines: at most four decimals, no trailing zeros. */
export function formatNumber(value: number): string {
  return String(Number(value.toFixed(4)));
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}
