export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** `part / whole * 100`, or 0 when there is nothing to divide by. */
export function percentage(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

export function mean(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}
