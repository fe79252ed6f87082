import "dotenv/config";
import express from "express";
import cors from "cors";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";

import { loadConfig, getAllowedOrigins, getParserOptions } from "./src/config.js";
import { runMigrations } from "./src/db/run-migrations.js";
import { getDefaultRuleTables } from "./src/helpers/rewrite-rules.js";
import type { PrParserOptions } from "./src/helpers/pr-parser.js";
import { registerParsePrTools } from "./src/tools/parse-pr.js";
import { registerExerciseTools } from "./src/tools/exercises.js";
import { registerProgramTool } from "./src/tools/program.js";
import { createApiRouter, sendError } from "./src/api/routes.js";
import { authenticateRequest } from "./src/auth/middleware.js";
import { runWithUser } from "./src/context/user-context.js";
import pool from "./src/db/connection.js";

const config = loadConfig();
const parserOptions = getParserOptions(config);

// A malformed rule file should stop startup, not the first request.
getDefaultRuleTables();

const app = express();
app.set("trust proxy", 1);
app.use(cors({
  origin: getAllowedOrigins(config),
  methods: ["GET", "POST", "DELETE", "OPTIONS"],
  allowedHeaders: ["Content-Type", "Authorization", "X-User-Id"],
}));
app.use(express.json({ limit: "1mb" }));

// Health check
app.get("/health", (_req, res) => {
  res.json({ status: "ok" });
});

app.use(createApiRouter(config));

// New McpServer per request: stateless, so any instance can serve any request.
function createConfiguredServer(options: PrParserOptions): McpServer {
  const server = new McpServer(
    { name: "pr-tracker", version: "1.0.0" },
    {
      instructions: `You turn lifters' personal-record messages into structured records.
Use parse_pr for a single line ("db bench 85/12") and parse_pr_lines when the message has several lines.
Program exercises default to the user's active program; get_program_exercises lists them.
A null pr means the message is not a PR: do not record anything for it.`,
    }
  );

  registerParsePrTools(server, options);
  registerExerciseTools(server, options);
  registerProgramTool(server);

  return server;
}

// MCP endpoint
app.all("/mcp", async (req, res) => {
  try {
    const userId = authenticateRequest(req, config);

    await runWithUser(userId, async () => {
      const server = createConfiguredServer(parserOptions);

      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
      });

      res.on("close", () => {
        void transport.close();
        void server.close();
      });

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    });
  } catch (err) {
    sendError(res, err, "mcp");
  }
});

async function start() {
  try {
    await runMigrations(pool);
    const server = app.listen(config.PORT, () => {
      console.log(`PR tracker server running on port ${config.PORT} (${parserOptions.mode} parsing, ${parserOptions.formula})`);
    });

    // Graceful shutdown handling
    const shutdown = (signal: string) => {
      console.log(`\n${signal} received. Shutting down gracefully...`);
      server.close(async () => {
        console.log("HTTP server closed.");
        try {
          await pool.end();
          console.log("Database pool closed.");
          process.exit(0);
        } catch (err) {
          console.error("Error closing database pool:", err);
          process.exit(1);
        }
      });

      // Force close after 10 seconds
      setTimeout(() => {
        console.error("Forced shutdown after timeout.");
        process.exit(1);
      }, 10_000).unref();
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
  } catch (err) {
    console.error("Failed to start:", err);
    process.exit(1);
  }
}

void start();
