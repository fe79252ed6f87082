import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { handleNormalize, handleMatch } from "../api/handlers.js";
import type { PrParserOptions } from "../helpers/pr-parser.js";
import { toolResponse, safeHandler } from "../helpers/tool-response.js";

export function registerExerciseTools(server: McpServer, options: PrParserOptions) {
  server.registerTool(
    "normalize_exercise",
    {
      description: `Rewrites a free-form exercise name into canonical form ("db bench" → "dumbbell bench press").
Pass weight for a bare "squat": 0 means bodyweight squat, above ${options.loadedWeightThreshold} means barbell back squat.`,
      inputSchema: {
        name: z.string(),
        weight: z.number().nonnegative().nullable().optional(),
      },
      annotations: { readOnlyHint: true },
    },
    safeHandler("normalize_exercise", async (args) => {
      return toolResponse(handleNormalize(args, options));
    })
  );

  server.registerTool(
    "match_exercise",
    {
      description: `Normalizes a name and matches it against the program exercises.
Returns { canonical, score, usedFuzzy, band }. band is "exact", "fuzzy" (score >= ${options.threshold}), "near_miss" (>= ${options.nearMissThreshold}), "unrelated" or "empty". Below the threshold canonical is the normalized input.`,
      inputSchema: {
        name: z.string(),
        weight: z.number().nonnegative().nullable().optional(),
        program_exercises: z.union([z.array(z.string()), z.string()]).optional(),
      },
      annotations: { readOnlyHint: true },
    },
    safeHandler("match_exercise", async (args) => {
      const result = await handleMatch(args, options);
      return toolResponse({ ...result });
    })
  );
}
