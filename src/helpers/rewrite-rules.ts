import fs from "fs";
import { z } from "zod";

export type WeightCondition = "bodyweight" | "loaded";

export const rewriteRuleSchema = z.object({
  pattern: z.string().min(1),
  replacement: z.string(),
  when: z.string().min(1).optional(),
  unless: z.string().min(1).optional(),
  weight: z.enum(["bodyweight", "loaded"]).optional(),
});

export type RewriteRuleSpec = z.infer<typeof rewriteRuleSchema>;

const ruleTableSchema = z.array(rewriteRuleSchema);

export const ruleFileSchema = z.object({
  typos: ruleTableSchema,
  abbreviations: ruleTableSchema,
  equipment: ruleTableSchema,
  compounds: ruleTableSchema,
  plurals: ruleTableSchema,
  modifiers: ruleTableSchema,
  pressCompletion: ruleTableSchema,
  trailing: ruleTableSchema,
  inclines: ruleTableSchema,
  families: ruleTableSchema,
});

export type RuleTableName = keyof z.infer<typeof ruleFileSchema>;

export interface RewriteRule {
  pattern: RegExp;
  replacement: string;
  when?: RegExp;
  unless?: RegExp;
  weight?: WeightCondition;
}

export type RuleTables = Record<RuleTableName, RewriteRule[]>;

export interface RuleContext {
  /** Logged weight; null/undefined means "unknown" and disables weight-conditioned rules. */
  weight?: number | null;
  /** Weights strictly above this count as loaded. */
  loadedWeightThreshold: number;
}

export const DEFAULT_RULES_URL = new URL("../data/normalization-rules.json", import.meta.url);

/**
 * Compiles a rule from its JSON form. The substitution pattern is global;
 * guards are not, so `test()` never carries lastIndex state between calls.
 * Throws a SyntaxError for an invalid regex.
 */
export function compileRule(source: RewriteRuleSpec): RewriteRule {
  return {
    pattern: new RegExp(source.pattern, "g"),
    replacement: source.replacement,
    ...(source.when ? { when: new RegExp(source.when) } : {}),
    ...(source.unless ? { unless: new RegExp(source.unless) } : {}),
    ...(source.weight ? { weight: source.weight } : {}),
  };
}

function weightAllows(condition: WeightCondition, ctx: RuleContext): boolean {
  if (ctx.weight == null) return false;
  if (condition === "bodyweight") return ctx.weight === 0;
  return ctx.weight > ctx.loadedWeightThreshold;
}

export function applyRule(text: string, rule: RewriteRule, ctx: RuleContext): string {
  if (rule.weight && !weightAllows(rule.weight, ctx)) return text;
  if (rule.when && !rule.when.test(text)) return text;
  if (rule.unless && rule.unless.test(text)) return text;
  return text.replace(rule.pattern, rule.replacement);
}

/**
 * Applies a table in order. Each rule sees the output of the previous one,
 * so guards are evaluated against the text as rewritten so far.
 */
export function applyRules(text: string, rules: readonly RewriteRule[], ctx: RuleContext): string {
  return rules.reduce((current, rule) => applyRule(current, rule, ctx), text);
}

export function parseRuleFile(raw: unknown): RuleTables {
  const parsed = ruleFileSchema.parse(raw);
  return {
    typos: parsed.typos.map(compileRule),
    abbreviations: parsed.abbreviations.map(compileRule),
    equipment: parsed.equipment.map(compileRule),
    compounds: parsed.compounds.map(compileRule),
    plurals: parsed.plurals.map(compileRule),
    modifiers: parsed.modifiers.map(compileRule),
    pressCompletion: parsed.pressCompletion.map(compileRule),
    trailing: parsed.trailing.map(compileRule),
    inclines: parsed.inclines.map(compileRule),
    families: parsed.families.map(compileRule),
  };
}

export function loadRuleTables(file: URL = DEFAULT_RULES_URL): RuleTables {
  const raw: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
  return parseRuleFile(raw);
}

let defaultTables: RuleTables | null = null;

/** Rule tables shipped with the service, read and compiled on first use. */
export function getDefaultRuleTables(): RuleTables {
  if (!defaultTables) {
    defaultTables = loadRuleTables();
  }
  return defaultTables;
}
