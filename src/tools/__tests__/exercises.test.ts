import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../db/connection.js", () => ({
  default: { query: vi.fn(), connect: vi.fn() },
}));

vi.mock("../../helpers/program-exercises.js", () => ({
  getProgramExercises: vi.fn(),
}));

vi.mock("../../context/user-context.js", () => ({
  getUserId: vi.fn().mockReturnValue("user-1"),
}));

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerExerciseTools } from "../exercises.js";
import { getProgramExercises } from "../../helpers/program-exercises.js";
import { DEFAULT_PARSER_OPTIONS } from "../../helpers/pr-parser.js";

const mockGetProgram = getProgramExercises as ReturnType<typeof vi.fn>;

const handlers: Record<string, Function> = {};

describe("exercise tools", () => {
  beforeEach(() => {
    mockGetProgram.mockReset();

    const server = {
      registerTool: vi.fn((name: string, _config: any, handler: Function) => {
        handlers[name] = handler;
      }),
    } as unknown as McpServer;
    registerExerciseTools(server, DEFAULT_PARSER_OPTIONS);
  });

  describe("normalize_exercise", () => {
    it("returns the normalized name", async () => {
      const result = await handlers.normalize_exercise({ name: "db bench" });
      expect(JSON.parse(result.content[0].text)).toEqual({ normalized: "dumbbell bench press" });
    });

    it("uses the weight for a bare squat", async () => {
      const result = await handlers.normalize_exercise({ name: "squat", weight: 0 });
      expect(JSON.parse(result.content[0].text)).toEqual({ normalized: "bodyweight squat" });
    });
  });

  describe("match_exercise", () => {
    it("normalizes, then matches against the active program", async () => {
      mockGetProgram.mockResolvedValueOnce(["dumbbell bench press", "chinup"]);

      // typo pass gives "dumbbell bentch press"
      const result = await handlers.match_exercise({ name: "dumbell bentch press" });

      expect(JSON.parse(result.content[0].text)).toEqual({
        canonical: "dumbbell bench press",
        score: 98,
        usedFuzzy: true,
        band: "fuzzy",
      });
    });

    it("reports near misses without substituting", async () => {
      const result = await handlers.match_exercise({ name: "goblet squat hold", program_exercises: ["goblet squat"] });

      expect(JSON.parse(result.content[0].text)).toEqual({
        canonical: "goblet squat hold",
        score: 83,
        usedFuzzy: false,
        band: "near_miss",
      });
    });
  });
});
