/**
 * Timestamp and percentage formatting shared by the payload builders.
 */

export function iso8601Timestamp(date: Date = new Date()): string {
  return date.toISOString();
}

export function unixTimestamp(date: Date = new Date()): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Format a 0-100 scale percentage for display. `formatPercent(150)` is `"150%"`,
 * `formatPercent(3, 2)` is `"3.00%"`.
 */
export function formatPercent(percent: number, fractionDigits = 0): string {
  return `${percent.toFixed(fractionDigits)}%`;
}

/** `Bounce Rate` -> `bounce_rate` */
export function toFieldName(label: string): string {
  return label.replace(/ /g, '_').toLowerCase();
}
