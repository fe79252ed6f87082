import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { handleProgramExercises } from "../api/handlers.js";
import { toolResponse, safeHandler } from "../helpers/tool-response.js";

export function registerProgramTool(server: McpServer) {
  server.registerTool(
    "get_program_exercises",
    {
      description: "Lists the canonical exercise names of the user's active program in program order (workout A first). Empty when there is no active program.",
      inputSchema: {},
      annotations: { readOnlyHint: true },
    },
    safeHandler("get_program_exercises", async () => {
      return toolResponse(await handleProgramExercises());
    })
  );
}
