/**
 * API handlers: business logic shared by the REST routes and the MCP tools.
 * Each handler validates its body with zod and returns a JSON-ready object.
 */

import { z } from "zod";
import { getUserId } from "../context/user-context.js";
import { getProgramExercises } from "../helpers/program-exercises.js";
import { parseStringArrayParam } from "../helpers/parse-helpers.js";
import { parsePrMessage, parsePrLines, type ParsedPR, type PrParserOptions } from "../helpers/pr-parser.js";
import { normalizeExerciseName } from "../helpers/exercise-normalizer.js";
import { resolveExerciseName, type MatchResult } from "../helpers/exercise-matcher.js";

const programExercisesParam = z
  .union([z.array(z.string()), z.string()])
  .optional()
  .transform((v) => parseStringArrayParam(v));

export const parseBodySchema = z.object({
  message: z.string(),
  program_exercises: programExercisesParam,
});

export const normalizeBodySchema = z.object({
  name: z.string(),
  weight: z.number().nonnegative().nullable().optional(),
});

export const matchBodySchema = normalizeBodySchema.extend({
  program_exercises: programExercisesParam,
});

/** Uses the caller's list when given, else the acting user's active program. */
async function resolveProgram(programExercises: string[] | null): Promise<string[]> {
  return programExercises ?? getProgramExercises(getUserId());
}

// ============================================================================
// PARSING
// ============================================================================

export async function handleParse(body: unknown, options: PrParserOptions): Promise<{ pr: ParsedPR | null }> {
  const { message, program_exercises } = parseBodySchema.parse(body);
  const program = await resolveProgram(program_exercises);
  return { pr: parsePrMessage(message, program, options) };
}

export async function handleParseLines(
  body: unknown,
  options: PrParserOptions
): Promise<{ prs: ParsedPR[]; skipped: number }> {
  const { message, program_exercises } = parseBodySchema.parse(body);
  const program = await resolveProgram(program_exercises);
  const prs = parsePrLines(message, program, options);
  const nonBlank = message.split(/\r?\n/).filter((line) => line.trim()).length;
  return { prs, skipped: nonBlank - prs.length };
}

// ============================================================================
// EXERCISE NAMES
// ============================================================================

export function handleNormalize(body: unknown, options: PrParserOptions): { normalized: string } {
  const { name, weight } = normalizeBodySchema.parse(body);
  return {
    normalized: normalizeExerciseName(name, weight, { loadedWeightThreshold: options.loadedWeightThreshold }),
  };
}

export async function handleMatch(body: unknown, options: PrParserOptions): Promise<MatchResult> {
  const { name, weight, program_exercises } = matchBodySchema.parse(body);
  const program = await resolveProgram(program_exercises);
  return resolveExerciseName(name, program, {
    weight,
    threshold: options.threshold,
    nearMissThreshold: options.nearMissThreshold,
    loadedWeightThreshold: options.loadedWeightThreshold,
  });
}

export async function handleProgramExercises(): Promise<{ program_exercises: string[] }> {
  return { program_exercises: await getProgramExercises(getUserId()) };
}
