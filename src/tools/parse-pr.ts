import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { handleParse, handleParseLines } from "../api/handlers.js";
import type { PrParserOptions } from "../helpers/pr-parser.js";
import { toolResponse, safeHandler } from "../helpers/tool-response.js";

const programExercisesInput = z
  .union([z.array(z.string()), z.string()])
  .optional()
  .describe("Canonical program exercise names in program order. Omit to use the user's active program.");

export function registerParsePrTools(server: McpServer, options: PrParserOptions) {
  server.registerTool(
    "parse_pr",
    {
      description: `Parses one personal-record message like "db bench 85/12" or "chinup BW/8".
Returns { pr } where pr is null when the message is not a PR (coach comment, wrong shape, reps outside ${options.minReps}-${options.maxReps}, weight above ${options.maxWeight}).
Otherwise pr has raw_exercise, canonical_exercise, weight, reps, estimated_1rm, match_score, used_fuzzy.`,
      inputSchema: {
        message: z.string(),
        program_exercises: programExercisesInput,
      },
      annotations: { readOnlyHint: true },
    },
    safeHandler("parse_pr", async (args) => {
      return toolResponse(await handleParse(args, options));
    })
  );

  server.registerTool(
    "parse_pr_lines",
    {
      description: `Parses a multi-line message, one PR per line. Returns { prs, skipped } where skipped counts non-blank lines that did not parse.`,
      inputSchema: {
        message: z.string(),
        program_exercises: programExercisesInput,
      },
      annotations: { readOnlyHint: true },
    },
    safeHandler("parse_pr_lines", async (args) => {
      return toolResponse(await handleParseLines(args, options));
    })
  );
}
