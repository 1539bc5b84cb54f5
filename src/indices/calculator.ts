import type { Verdict } from '../types/index.js';
import { ValidationError } from '../errors.js';
import { clamp01, round6 } from '../gates/aggregate.js';

export interface IndicesSettings {
  /** Protection Index reported when no rule fired. Kept below 1.0 for calibration headroom. */
  baseline: number;
  /** Lowest Protection Index reported for any verdict. */
  floor: number;
}

export const DEFAULT_INDICES: IndicesSettings = { baseline: 0.99, floor: 0.01 };

/** Pre-check summary: inverse of the assessed risk. */
export function protectionIndex(verdict: Verdict, settings: IndicesSettings = DEFAULT_INDICES): number {
  if (verdict.phase !== 'pre') {
    throw new ValidationError('Protection Index is defined for pre-check verdicts only', { phase: verdict.phase });
  }
  if (verdict.fired.length === 0) {
    return round6(clamp01(settings.baseline));
  }
  // Capped at the baseline so a fired rule never scores above a clean request.
  return round6(clamp01(Math.min(settings.baseline, Math.max(settings.floor, 1 - verdict.risk))));
}

/** Post-check summary: zero whenever the output cannot be withdrawn. */
export function moralHealthIndex(verdict: Verdict): number {
  if (verdict.phase !== 'post' || verdict.reversible === undefined) {
    throw new ValidationError('Moral Health Index is defined for post-check verdicts only', { phase: verdict.phase });
  }
  return verdict.reversible ? round6(clamp01(1 - verdict.risk)) : 0;
}
