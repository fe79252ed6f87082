import { z } from "zod";
import { DEFAULT_PARSER_OPTIONS, type PrParserOptions } from "./helpers/pr-parser.js";

const intFromEnv = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const configSchema = z
  .object({
    PORT: intFromEnv(3001),
    NODE_ENV: z.string().optional(),
    DATABASE_URL: z.string().min(1).optional(),
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),
    ALLOWED_ORIGINS: z.string().optional(),
    API_TOKEN: z.string().min(1).optional(),
    DEV_USER_ID: z.string().min(1).optional(),
    MATCH_THRESHOLD: z.coerce.number().min(0).max(100).default(DEFAULT_PARSER_OPTIONS.threshold),
    NEAR_MISS_THRESHOLD: z.coerce.number().min(0).max(100).default(DEFAULT_PARSER_OPTIONS.nearMissThreshold),
    PR_PARSE_MODE: z.enum(["strict", "permissive"]).default(DEFAULT_PARSER_OPTIONS.mode),
    ONE_REP_MAX_FORMULA: z.enum(["epley", "epley_legacy"]).default(DEFAULT_PARSER_OPTIONS.formula),
    MIN_REPS: intFromEnv(DEFAULT_PARSER_OPTIONS.minReps),
    MAX_REPS: intFromEnv(DEFAULT_PARSER_OPTIONS.maxReps),
    MAX_WEIGHT: z.coerce.number().positive().default(DEFAULT_PARSER_OPTIONS.maxWeight),
    LOADED_SQUAT_THRESHOLD: z.coerce.number().nonnegative().default(DEFAULT_PARSER_OPTIONS.loadedWeightThreshold),
  })
  .refine((c) => c.NEAR_MISS_THRESHOLD <= c.MATCH_THRESHOLD, {
    message: "NEAR_MISS_THRESHOLD must be <= MATCH_THRESHOLD",
    path: ["NEAR_MISS_THRESHOLD"],
  })
  .refine((c) => c.MIN_REPS <= c.MAX_REPS, {
    message: "MIN_REPS must be <= MAX_REPS",
    path: ["MIN_REPS"],
  });

export type Config = z.infer<typeof configSchema>;

/**
 * Validates environment variables. Empty strings count as unset so a blank
 * line in .env falls back to the default. Throws a ZodError on bad values.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  return configSchema.parse(present);
}

export function getParserOptions(config: Config): PrParserOptions {
  return {
    mode: config.PR_PARSE_MODE,
    threshold: config.MATCH_THRESHOLD,
    nearMissThreshold: config.NEAR_MISS_THRESHOLD,
    minReps: config.MIN_REPS,
    maxReps: config.MAX_REPS,
    maxWeight: config.MAX_WEIGHT,
    formula: config.ONE_REP_MAX_FORMULA,
    loadedWeightThreshold: config.LOADED_SQUAT_THRESHOLD,
  };
}

export function getAllowedOrigins(config: Config): string[] {
  if (config.ALLOWED_ORIGINS) {
    return config.ALLOWED_ORIGINS.split(",").map(s => s.trim()).filter(Boolean);
  }
  if (!config.NODE_ENV || config.NODE_ENV === "development") {
    return ["http://localhost:3000", "http://localhost:3001", "http://localhost:5173"];
  }
  return [];
}

export function isProduction(config: Config): boolean {
  return config.NODE_ENV === "production";
}
