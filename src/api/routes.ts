import { Router, type Request, type Response } from "express";
import { ZodError } from "zod";
import { authenticateRequest, AuthError } from "../auth/middleware.js";
import { runWithUser } from "../context/user-context.js";
import { getParserOptions, type Config } from "../config.js";
import type { PrParserOptions } from "../helpers/pr-parser.js";
import {
  handleParse,
  handleParseLines,
  handleNormalize,
  handleMatch,
  handleProgramExercises,
} from "./handlers.js";

export const AUTH_REALM = 'Bearer realm="pr-tracker"';

/**
 * Maps an error to the HTTP response: 401 for auth failures, 400 for
 * invalid bodies, 500 (logged) for everything else.
 */
export function sendError(res: Response, err: unknown, tag: string): void {
  if (err instanceof AuthError) {
    res.setHeader("WWW-Authenticate", AUTH_REALM);
    res.status(401).json({ error: "unauthorized", message: err.message });
    return;
  }
  if (err instanceof ZodError) {
    res.status(400).json({ error: "invalid_request", issues: err.issues });
    return;
  }
  console.error(`[${tag}] Unhandled error:`, err instanceof Error ? err.stack : err);
  if (!res.headersSent) {
    res.status(500).json({ error: "internal_error", message: "An unexpected error occurred" });
  }
}

type ApiHandler = (body: unknown, options: PrParserOptions) => unknown;

/**
 * Wraps a handler into an express route: authenticates, runs the handler
 * inside the acting user's context and writes the JSON result.
 */
export function apiRoute(config: Config, tag: string, handler: ApiHandler) {
  const options = getParserOptions(config);
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const userId = authenticateRequest(req, config);
      const result = await runWithUser(userId, () => handler(req.body, options));
      res.json(result);
    } catch (err) {
      sendError(res, err, tag);
    }
  };
}

export function createApiRouter(config: Config): Router {
  const router = Router();

  router.post("/api/parse", apiRoute(config, "api/parse", handleParse));
  router.post("/api/parse-lines", apiRoute(config, "api/parse-lines", handleParseLines));
  router.post("/api/normalize", apiRoute(config, "api/normalize", handleNormalize));
  router.post("/api/match", apiRoute(config, "api/match", handleMatch));
  router.get("/api/program-exercises", apiRoute(config, "api/program-exercises", () => handleProgramExercises()));

  return router;
}
