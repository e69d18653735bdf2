import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SuggestionService } from "../services/suggestionService.js";
import { formatRewrite, jsonResult } from "./formatting.js";

export function registerExpandTextTool(server: McpServer, service: SuggestionService) {
  server.registerTool(
    "expand_text",
    {
      title: "Expand Text",
      description: "Extends the selected text with related sentences from the index or the online fallback.",
      inputSchema: {
        selected_text: z.string().min(1).describe("Text to expand"),
        context_text: z.string().optional().describe("Text around the selection"),
      },
    },
    async ({ selected_text, context_text }) =>
      jsonResult(formatRewrite(await service.expandText(selected_text, context_text ?? ""))),
  );
}
