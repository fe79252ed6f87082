import { resolveExerciseName, DEFAULT_MATCH_THRESHOLD, DEFAULT_NEAR_MISS_THRESHOLD, type MatchOptions } from "./exercise-matcher.js";
import { isCoachComment, DEFAULT_LOADED_WEIGHT_THRESHOLD } from "./exercise-normalizer.js";
import { estimateOneRepMax, DEFAULT_ONE_REP_MAX_FORMULA, type OneRepMaxFormula } from "./stats-calculator.js";

/** A personal record parsed out of one line of user text. */
export interface ParsedPR {
  raw_exercise: string;
  canonical_exercise: string;
  weight: number;
  reps: number;
  estimated_1rm: number;
  match_score: number;
  used_fuzzy: boolean;
}

export type ParseMode = "strict" | "permissive";

export interface PrParserOptions extends Required<MatchOptions> {
  mode: ParseMode;
  minReps: number;
  maxReps: number;
  maxWeight: number;
  formula: OneRepMaxFormula;
  loadedWeightThreshold: number;
}

export const DEFAULT_PARSER_OPTIONS: PrParserOptions = {
  mode: "strict",
  threshold: DEFAULT_MATCH_THRESHOLD,
  nearMissThreshold: DEFAULT_NEAR_MISS_THRESHOLD,
  minReps: 3,
  maxReps: 50,
  maxWeight: 1000,
  formula: DEFAULT_ONE_REP_MAX_FORMULA,
  loadedWeightThreshold: DEFAULT_LOADED_WEIGHT_THRESHOLD,
};

interface RawSet {
  exercise: string;
  weight: number;
  reps: number;
}

// "<exercise> <weight>/<reps>", weight may be "bw". Lazy exercise + end anchor
// means the last weight/reps suffix wins.
const STRICT_PATTERN = /^(.+?)\s+([0-9]+\.?[0-9]*|bw)\s*\/\s*([0-9]+)$/i;

const WEIGHT = "(\\d+(?:\\.\\d+)?|bw|bodyweight)";

const PERMISSIVE_PATTERNS: ReadonlyArray<{ pattern: RegExp; reversed: boolean }> = [
  { pattern: new RegExp(`^(.+?)\\s+${WEIGHT}\\s*[/*x×]\\s*(\\d+)`), reversed: false },
  { pattern: new RegExp(`^(.+?)\\s+${WEIGHT}\\s*-\\s*(\\d+)`), reversed: false },
  { pattern: new RegExp(`^(\\d+)\\s*[x×]\\s*${WEIGHT}\\s+(.+)`), reversed: true },
  { pattern: new RegExp(`^(.+?):\\s*${WEIGHT}\\s*[/*x×]\\s*(\\d+)`), reversed: false },
  { pattern: new RegExp(`^(.+?)\\s+${WEIGHT}\\s+(\\d+)$`), reversed: false },
];

function parseWeight(token: string): number {
  const lower = token.toLowerCase();
  return lower === "bw" || lower === "bodyweight" ? 0 : Number(token);
}

function extractStrict(text: string): RawSet | null {
  const match = STRICT_PATTERN.exec(text);
  if (!match) return null;
  return {
    exercise: match[1].trim(),
    weight: parseWeight(match[2]),
    reps: Number(match[3]),
  };
}

function stripFiller(text: string): string {
  return text
    .toLowerCase()
    .replace(/\b(?:new pr|pr|hit|got|did|at|for|with|just|finally|crushed)\b/g, " ")
    .replace(/\b(?:reps?|repetitions?)\b/g, " ")
    .replace(/(\d)(?:lbs?|kgs?)\b/g, "$1")
    .replace(/\b(?:lbs?|pounds?|kgs?|kilos?)\b/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function extractPermissive(text: string): RawSet | null {
  const cleaned = stripFiller(text);
  for (const { pattern, reversed } of PERMISSIVE_PATTERNS) {
    const match = pattern.exec(cleaned);
    if (!match) continue;
    const [exercise, weight, reps] = reversed
      ? [match[3], match[2], match[1]]
      : [match[1], match[2], match[3]];
    return {
      exercise: exercise.replace(/[^\w\s]/g, "").replace(/\s+/g, " ").trim(),
      weight: parseWeight(weight),
      reps: Number(reps),
    };
  }
  return null;
}

function withinBounds(set: RawSet, options: PrParserOptions): boolean {
  if (!Number.isFinite(set.weight) || set.weight < 0 || set.weight > options.maxWeight) return false;
  if (!Number.isInteger(set.reps) || set.reps < options.minReps || set.reps > options.maxReps) return false;
  return set.exercise.length > 0;
}

/**
 * Parses "<exercise> <weight>/<reps>" (weight may be BW) into a PR record.
 * The exercise is normalized with the weight as context and matched against
 * the user's program exercises, which must be in program order.
 *
 * Returns null for coach comments (leading `*`), text that doesn't match the
 * expected shape, and weight/reps outside the sanity bounds
 * (0-1000 and 3-50 by default). Permissive mode also accepts "x", "*", "-",
 * colon and space separators, unit/filler words and "reps x weight exercise".
 */
export function parsePrMessage(
  message: string,
  programExercises: readonly string[],
  options: Partial<PrParserOptions> = {}
): ParsedPR | null {
  const opts: PrParserOptions = { ...DEFAULT_PARSER_OPTIONS, ...options };
  if (isCoachComment(message)) return null;

  const text = message.trim();
  const set = opts.mode === "permissive" ? extractPermissive(text) : extractStrict(text);
  if (!set || !withinBounds(set, opts)) return null;

  const match = resolveExerciseName(set.exercise, programExercises, {
    weight: set.weight,
    threshold: opts.threshold,
    nearMissThreshold: opts.nearMissThreshold,
    loadedWeightThreshold: opts.loadedWeightThreshold,
  });
  if (!match.canonical) return null;

  return {
    raw_exercise: set.exercise,
    canonical_exercise: match.canonical,
    weight: set.weight,
    reps: set.reps,
    estimated_1rm: estimateOneRepMax(set.weight, set.reps, opts.formula),
    match_score: match.score,
    used_fuzzy: match.usedFuzzy,
  };
}

/**
 * Parses every line of a message independently; a single post can report
 * several PRs. Lines that don't parse are skipped.
 */
export function parsePrLines(
  message: string,
  programExercises: readonly string[],
  options: Partial<PrParserOptions> = {}
): ParsedPR[] {
  const prs: ParsedPR[] = [];
  for (const line of message.split(/\r?\n/)) {
    const parsed = parsePrMessage(line, programExercises, options);
    if (parsed) prs.push(parsed);
  }
  return prs;
}
