/**
 * Arithmetic mean of the given values, or 0 for an empty list.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sum = values.reduce((acc, value) => acc + value, 0);
  return sum / values.length;
}

/**
 * Formats a rating or a duration with one decimal (e.g. 7 -> "7.0").
 */
export function formatDecimal(value: number): string {
  return value.toFixed(1);
}
