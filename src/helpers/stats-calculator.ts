export type OneRepMaxFormula = "epley" | "epley_legacy";

export const DEFAULT_ONE_REP_MAX_FORMULA: OneRepMaxFormula = "epley";

/**
 * Estimates one-rep max from a weight/reps set.
 *   - epley:        weight × (1 + reps/30)
 *   - epley_legacy: weight × reps × 0.0333 + weight (older records were scored with this)
 *
 * Bodyweight sets (weight 0) return 0: those are tracked by rep count instead.
 * The result is not rounded; presentation code rounds it.
 */
export function estimateOneRepMax(
  weight: number,
  reps: number,
  formula: OneRepMaxFormula = DEFAULT_ONE_REP_MAX_FORMULA
): number {
  if (weight === 0) return 0;
  if (formula === "epley_legacy") {
    return weight * reps * 0.0333 + weight;
  }
  return weight * (1 + reps / 30);
}
