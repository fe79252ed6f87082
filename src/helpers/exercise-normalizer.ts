import { applyRules, getDefaultRuleTables, type RuleContext, type RuleTables } from "./rewrite-rules.js";

export const DEFAULT_LOADED_WEIGHT_THRESHOLD = 15;

export interface NormalizerOptions {
  /** A bare "squat" logged above this weight becomes "barbell back squat". */
  loadedWeightThreshold?: number;
  rules?: RuleTables;
}

// Lines starting with this marker are coach annotations, never exercise names.
const COMMENT_MARKER = "*";

// Ceiling on rewrite passes before giving up on a fixed point.
export const MAX_REWRITE_PASSES = 8;

export interface NormalizationTrace {
  normalized: string;
  /** Rewrite passes run, including the final one that changed nothing. */
  passes: number;
  /** False only if the pass ceiling was hit before the text settled. */
  stable: boolean;
}

const INCLINE_DEGREES_BEFORE = /\b(\d{1,2}) ?(?:degrees? |deg )?incline\b/g;
const INCLINE_DEGREES_AFTER = /\bincline (\d{1,2}) ?(?:degrees?|deg)\b/g;

export function isCoachComment(text: string): boolean {
  return text.trim().startsWith(COMMENT_MARKER);
}

function cleanup(text: string): string {
  return text
    .toLowerCase()
    .replace(/\s+/g, " ")
    .replace(/[.,'’]/g, "")
    .replace(/\([^)]*\)/g, "")
    .replace(/-/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function stripLeadingArticle(text: string): string {
  return text.startsWith("the ") ? text.slice(4) : text;
}

function inclineBucket(degrees: number): string {
  if (degrees <= 35) return "low incline";
  if (degrees <= 50) return "incline";
  return "high incline";
}

/**
 * Folds incline angles on presses into three buckets: low, standard
 * (plain "incline") and high. Word forms come from the rule table,
 * explicit degrees are bucketed numerically.
 */
function bucketInclines(text: string, rules: RuleTables, ctx: RuleContext): string {
  if (!/\bpress\b/.test(text)) return text;
  return applyRules(text, rules.inclines, ctx)
    .replace(INCLINE_DEGREES_BEFORE, (_match, degrees: string) => inclineBucket(Number(degrees)))
    .replace(INCLINE_DEGREES_AFTER, (_match, degrees: string) => inclineBucket(Number(degrees)));
}

function stripTrailingModifiers(text: string, rules: RuleTables, ctx: RuleContext): string {
  let current = text;
  for (;;) {
    const next = applyRules(current, rules.trailing, ctx).trim();
    if (next === current) return current;
    current = next;
  }
}

function collapseRepeatedWords(text: string): string {
  const words = text.split(" ").filter(Boolean);
  return words.filter((word, i) => i === 0 || word !== words[i - 1]).join(" ");
}

function rewrite(text: string, rules: RuleTables, ctx: RuleContext): string {
  let exercise = applyRules(text, rules.typos, ctx);
  exercise = stripLeadingArticle(exercise);
  exercise = applyRules(exercise, rules.abbreviations, ctx);
  exercise = applyRules(exercise, rules.equipment, ctx);
  exercise = applyRules(exercise, rules.compounds, ctx);
  exercise = applyRules(exercise, rules.plurals, ctx);
  exercise = applyRules(exercise, rules.modifiers, ctx);
  exercise = applyRules(exercise, rules.pressCompletion, ctx);
  exercise = stripTrailingModifiers(exercise, rules, ctx);
  exercise = bucketInclines(exercise, rules, ctx);
  exercise = applyRules(exercise, rules.families, ctx);
  exercise = collapseRepeatedWords(exercise);
  return exercise.trim();
}

/**
 * Like {@link normalizeExerciseName}, but also reports how many rewrite
 * passes it took to reach a fixed point.
 */
export function traceNormalization(
  raw: string,
  weight?: number | null,
  options: NormalizerOptions = {}
): NormalizationTrace {
  if (isCoachComment(raw)) return { normalized: "", passes: 0, stable: true };

  const rules = options.rules ?? getDefaultRuleTables();
  const ctx: RuleContext = {
    weight,
    loadedWeightThreshold: options.loadedWeightThreshold ?? DEFAULT_LOADED_WEIGHT_THRESHOLD,
  };

  let exercise = cleanup(raw);
  let passes = 0;
  while (exercise && passes < MAX_REWRITE_PASSES) {
    passes++;
    const next = rewrite(exercise, rules, ctx);
    if (next === exercise) return { normalized: exercise, passes, stable: true };
    exercise = next;
  }
  return { normalized: exercise, passes, stable: !exercise };
}

/**
 * Rewrites a free-form exercise name into the canonical vocabulary:
 * typo fixes, abbreviation expansion, equipment synonyms, compound words,
 * singular nouns, modifier order, implicit "press", trailing annotations,
 * then the per-family canonical names.
 *
 * Returns "" for coach comments (leading `*`) and for input that is empty
 * after cleanup. `weight` only matters for a bare "squat": 0 means
 * bodyweight, above the loaded threshold means barbell back squat, anything
 * in between is left as typed.
 *
 * The rewrite is repeated until the text stops changing, so feeding the
 * result back in with the same weight returns it unchanged.
 *
 * @example
 *   normalizeExerciseName("db tricep tricep extension") // "dumbbell tricep extension"
 *   normalizeExerciseName("squat", 135)                 // "barbell back squat"
 */
export function normalizeExerciseName(
  raw: string,
  weight?: number | null,
  options: NormalizerOptions = {}
): string {
  return traceNormalization(raw, weight, options).normalized;
}
