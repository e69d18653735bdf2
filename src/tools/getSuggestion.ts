import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SuggestionService } from "../services/suggestionService.js";
import { formatSuggestionOutcome, jsonResult } from "./formatting.js";

export function registerGetSuggestionTool(server: McpServer, service: SuggestionService) {
  server.registerTool(
    "get_suggestion",
    {
      title: "Get Suggestion",
      description:
        "Waits for a request started with suggest_completion(wait=false) and returns its outcome.",
      inputSchema: {
        request_id: z.number().int().positive().describe("Id returned by suggest_completion"),
      },
    },
    async ({ request_id }) => {
      const settled = service.waitForSuggestion(request_id);
      if (!settled) {
        return jsonResult({ request_id, status: "unknown" });
      }
      return jsonResult(formatSuggestionOutcome(await settled));
    },
  );
}
