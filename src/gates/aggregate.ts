/**
 * Risk aggregation.
 *
 * Fired severities are combined as a saturating probabilistic sum,
 * `1 - Π(1 - s)`, taken in ascending rule id order so the floating-point
 * result is identical across runs. Each factor `(1 - s)` only shrinks as a
 * severity grows, so raising any fired severity never lowers the result.
 * The audience amplification scales the sum before clamping to [0, 1].
 */

const PRECISION = 1e6;

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function round6(value: number): number {
  return Math.round(value * PRECISION) / PRECISION;
}

export function aggregateRisk(severities: readonly number[], amplification = 0): number {
  let remaining = 1;
  for (const severity of severities) {
    remaining *= 1 - clamp01(severity);
  }
  const combined = (1 - remaining) * (1 + Math.max(0, amplification));
  return round6(clamp01(combined));
}
