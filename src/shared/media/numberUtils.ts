const DEFAULT_PRECISION = 2;

export function roundToPrecision(value: number, precision = DEFAULT_PRECISION): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

/** Renders a number for filter expressions without float noise (`0.30000000000000004` → `0.3`). */
export function formatDecimal(value: number, precision = 6): string {
  return String(roundToPrecision(value, precision));
}

export function toPercent(fraction: number): number {
  return roundToPrecision(fraction * 100);
}
