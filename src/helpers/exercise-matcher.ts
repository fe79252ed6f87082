import { normalizeExerciseName, type NormalizerOptions } from "./exercise-normalizer.js";

export const DEFAULT_MATCH_THRESHOLD = 85;
export const DEFAULT_NEAR_MISS_THRESHOLD = 70;

/**
 * How a match was decided:
 *   - exact: input is one of the candidates
 *   - fuzzy: best candidate scored at or above the threshold
 *   - near_miss: best score in [nearMissThreshold, threshold), input kept as typed
 *   - unrelated: best score below nearMissThreshold (or no candidates), input kept as typed
 *   - empty: nothing to match
 */
export type MatchBand = "exact" | "fuzzy" | "near_miss" | "unrelated" | "empty";

export interface MatchResult {
  canonical: string;
  /** 0-100 */
  score: number;
  usedFuzzy: boolean;
  band: MatchBand;
}

export interface MatchOptions {
  threshold?: number;
  nearMissThreshold?: number;
}

export interface ResolveOptions extends MatchOptions, NormalizerOptions {
  weight?: number | null;
}

function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      current[j] = a[i - 1] === b[j - 1]
        ? previous[j - 1] + 1
        : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }
  return previous[b.length];
}

/**
 * Normalized indel similarity, 100 * 2 * LCS / (|a| + |b|), unrounded.
 * Symmetric and case-sensitive. Two empty strings are identical (100).
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return (200 * longestCommonSubsequence(a, b)) / total;
}

/**
 * Matches an already-normalized name against the user's program exercises.
 *
 * Ties on the best score go to the candidate listed first, since the list
 * is in program order (workout A, then B, ...). Below the threshold the
 * input itself is returned, unflagged, so off-program work is kept as typed.
 *
 * Thresholds and ties are decided on the unrounded ratio; only the reported
 * score is rounded, so 84.6 stays below a threshold of 85.
 */
export function matchExercise(
  normalizedInput: string,
  candidates: readonly string[],
  options: MatchOptions = {}
): MatchResult {
  const threshold = options.threshold ?? DEFAULT_MATCH_THRESHOLD;
  const nearMissThreshold = options.nearMissThreshold ?? DEFAULT_NEAR_MISS_THRESHOLD;

  if (!normalizedInput) {
    return { canonical: "", score: 0, usedFuzzy: false, band: "empty" };
  }

  if (candidates.includes(normalizedInput)) {
    return { canonical: normalizedInput, score: 100, usedFuzzy: false, band: "exact" };
  }

  let bestRatio = 0;
  let bestMatch: string | null = null;
  for (const candidate of candidates) {
    const ratio = similarityRatio(normalizedInput, candidate);
    // strict ">" keeps the earliest candidate on ties
    if (bestMatch === null || ratio > bestRatio) {
      bestRatio = ratio;
      bestMatch = candidate;
    }
  }

  const score = Math.round(bestRatio);
  if (bestMatch !== null && bestRatio >= threshold) {
    return { canonical: bestMatch, score, usedFuzzy: true, band: "fuzzy" };
  }
  return {
    canonical: normalizedInput,
    score,
    usedFuzzy: false,
    band: bestMatch !== null && bestRatio >= nearMissThreshold ? "near_miss" : "unrelated",
  };
}

/**
 * Normalizes raw user text (with the logged weight as context) and matches
 * it against the program exercise list.
 */
export function resolveExerciseName(
  rawExercise: string,
  programExercises: readonly string[],
  options: ResolveOptions = {}
): MatchResult {
  const normalized = normalizeExerciseName(rawExercise, options.weight, options);
  return matchExercise(normalized, programExercises, options);
}
