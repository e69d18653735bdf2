import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SuggestionService } from "../services/suggestionService.js";
import { formatSuggestionOutcome, jsonResult } from "./formatting.js";

export function registerSuggestCompletionTool(server: McpServer, service: SuggestionService) {
  server.registerTool(
    "suggest_completion",
    {
      title: "Suggest Completion",
      description:
        "Suggests continuations for the text before the cursor. A newer call in the same session supersedes an older one. " +
        "With wait=false the request id comes back at once, for cancel_suggestion and get_suggestion.",
      inputSchema: {
        context_text: z.string().describe("Full text of the editor buffer"),
        cursor_position: z
          .number()
          .int()
          .min(0)
          .optional()
          .describe("Cursor offset; defaults to the end of context_text"),
        session_id: z.string().min(1).optional().describe("Editor session; defaults to 'default'"),
        wait: z
          .boolean()
          .optional()
          .describe("Wait for the suggestions (default true); false returns the pending request id"),
      },
    },
    async ({ context_text, cursor_position, session_id, wait }) => {
      const cursor = cursor_position ?? context_text.length;
      if (wait === false) {
        const requestId = service.querySuggestions(context_text, cursor, session_id);
        return jsonResult({
          request_id: requestId,
          status: "pending",
          stage: service.getRequestStage(requestId) ?? null,
        });
      }

      const outcome = await service.suggest(context_text, cursor, session_id);
      return jsonResult(formatSuggestionOutcome(outcome));
    },
  );
}
