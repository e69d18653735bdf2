import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SuggestionService } from "../services/suggestionService.js";
import { jsonResult } from "./formatting.js";

export function registerCancelSuggestionTool(server: McpServer, service: SuggestionService) {
  server.registerTool(
    "cancel_suggestion",
    {
      title: "Cancel Suggestion",
      description: "Cancels a pending suggestion request. Its result will not be delivered.",
      inputSchema: {
        request_id: z.number().int().positive().describe("Id returned by suggest_completion"),
      },
    },
    async ({ request_id }) =>
      jsonResult({
        request_id,
        cancelled: service.cancel(request_id),
        stage: service.getRequestStage(request_id) ?? null,
      }),
  );
}
