import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import {
  compileRule,
  applyRule,
  applyRules,
  parseRuleFile,
  getDefaultRuleTables,
  type RuleContext,
} from "../rewrite-rules.js";

const ctx: RuleContext = { weight: null, loadedWeightThreshold: 15 };

describe("compileRule", () => {
  it("makes the substitution global and the guards non-global", () => {
    const rule = compileRule({ pattern: "\\bdb\\b", replacement: "dumbbell", when: "row" });
    expect(rule.pattern.flags).toBe("g");
    expect(rule.when?.flags).toBe("");
    expect(rule.unless).toBeUndefined();
  });

  it("throws on an invalid regex", () => {
    expect(() => compileRule({ pattern: "(", replacement: "" })).toThrow(SyntaxError);
  });
});

describe("applyRule", () => {
  it("replaces every occurrence", () => {
    const rule = compileRule({ pattern: "\\bdb\\b", replacement: "dumbbell" });
    expect(applyRule("db db", rule, ctx)).toBe("dumbbell dumbbell");
  });

  it("respects when and unless guards", () => {
    const when = compileRule({ pattern: "\\boh\\b", replacement: "overhand", when: "\\brow\\b" });
    expect(applyRule("oh row", when, ctx)).toBe("overhand row");
    expect(applyRule("oh press", when, ctx)).toBe("oh press");

    const unless = compileRule({ pattern: "\\bbench\\b", replacement: "bench press", unless: "\\bpress\\b" });
    expect(applyRule("bench", unless, ctx)).toBe("bench press");
    expect(applyRule("bench press", unless, ctx)).toBe("bench press");
  });

  it("applies weight-conditioned rules only with a known weight", () => {
    const bodyweight = compileRule({ pattern: "^squat$", replacement: "bodyweight squat", weight: "bodyweight" });
    const loaded = compileRule({ pattern: "^squat$", replacement: "barbell back squat", weight: "loaded" });

    expect(applyRule("squat", bodyweight, { ...ctx, weight: 0 })).toBe("bodyweight squat");
    expect(applyRule("squat", bodyweight, ctx)).toBe("squat");
    expect(applyRule("squat", loaded, { ...ctx, weight: 15 })).toBe("squat");
    expect(applyRule("squat", loaded, { ...ctx, weight: 16 })).toBe("barbell back squat");
  });

  it("can be applied repeatedly with the same compiled rule", () => {
    const rule = compileRule({ pattern: "a", replacement: "b", when: "a" });
    expect(applyRule("a", rule, ctx)).toBe("b");
    expect(applyRule("a", rule, ctx)).toBe("b");
  });
});

describe("applyRules", () => {
  it("feeds each rule the previous output", () => {
    const rules = [
      compileRule({ pattern: "a", replacement: "b" }),
      compileRule({ pattern: "b", replacement: "c" }),
    ];
    expect(applyRules("a", rules, ctx)).toBe("c");
  });
});

describe("parseRuleFile", () => {
  it("rejects a file missing tables", () => {
    expect(() => parseRuleFile({ typos: [] })).toThrow(ZodError);
  });

  it("rejects a rule with an unknown weight condition", () => {
    const tables = {
      typos: [{ pattern: "x", replacement: "y", weight: "heavy" }],
      abbreviations: [], equipment: [], compounds: [], plurals: [],
      modifiers: [], pressCompletion: [], trailing: [], inclines: [], families: [],
    };
    expect(() => parseRuleFile(tables)).toThrow(ZodError);
  });
});

describe("getDefaultRuleTables", () => {
  it("loads and caches the shipped tables", () => {
    const tables = getDefaultRuleTables();
    expect(tables.families.length).toBeGreaterThan(0);
    expect(tables.typos[0].pattern).toBeInstanceOf(RegExp);
    expect(getDefaultRuleTables()).toBe(tables);
  });
});
