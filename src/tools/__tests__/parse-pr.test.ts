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
import { registerParsePrTools } from "../parse-pr.js";
import { getProgramExercises } from "../../helpers/program-exercises.js";
import { DEFAULT_PARSER_OPTIONS } from "../../helpers/pr-parser.js";

const mockGetProgram = getProgramExercises as ReturnType<typeof vi.fn>;

const handlers: Record<string, Function> = {};

describe("parse_pr tools", () => {
  beforeEach(() => {
    mockGetProgram.mockReset();

    const server = {
      registerTool: vi.fn((name: string, _config: any, handler: Function) => {
        handlers[name] = handler;
      }),
    } as unknown as McpServer;
    registerParsePrTools(server, DEFAULT_PARSER_OPTIONS);
  });

  describe("parse_pr", () => {
    it("parses against the given program", async () => {
      const result = await handlers.parse_pr({ message: "db bench 85/12", program_exercises: ["dumbbell bench press"] });
      const parsed = JSON.parse(result.content[0].text);

      expect(parsed.pr.canonical_exercise).toBe("dumbbell bench press");
      expect(parsed.pr.reps).toBe(12);
      expect(mockGetProgram).not.toHaveBeenCalled();
    });

    it("loads the active program when none is given", async () => {
      mockGetProgram.mockResolvedValueOnce(["chinup"]);

      const result = await handlers.parse_pr({ message: "chinup BW/8" });
      const parsed = JSON.parse(result.content[0].text);

      expect(mockGetProgram).toHaveBeenCalledWith("user-1");
      expect(parsed.pr).toEqual({
        raw_exercise: "chinup",
        canonical_exercise: "chinup",
        weight: 0,
        reps: 8,
        estimated_1rm: 0,
        match_score: 100,
        used_fuzzy: false,
      });
    });

    it("accepts the program as a JSON string", async () => {
      const result = await handlers.parse_pr({ message: "chinup BW/8", program_exercises: '["chinup"]' });
      expect(JSON.parse(result.content[0].text).pr.match_score).toBe(100);
    });

    it("returns a null pr for non-PR messages", async () => {
      const result = await handlers.parse_pr({ message: "* form check", program_exercises: [] });
      expect(JSON.parse(result.content[0].text)).toEqual({ pr: null });
    });

    it("returns a retryable error when the program lookup fails", async () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});
      mockGetProgram.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));

      const result = await handlers.parse_pr({ message: "chinup BW/8" });

      expect(result.isError).toBe(true);
      expect(JSON.parse(result.content[0].text)).toEqual({
        error: "Connection error. Please try again in a moment.",
        retryable: true,
      });
      spy.mockRestore();
    });
  });

  describe("parse_pr_lines", () => {
    it("returns every parsed line and the skipped count", async () => {
      const result = await handlers.parse_pr_lines({
        message: "db bench 85/12\n* coach note\nchinup BW/8\n\nrandom chatter",
        program_exercises: ["dumbbell bench press", "chinup"],
      });
      const parsed = JSON.parse(result.content[0].text);

      expect(parsed.prs).toHaveLength(2);
      expect(parsed.skipped).toBe(2);
    });
  });
});
