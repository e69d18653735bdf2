import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SuggestionService } from "../services/suggestionService.js";
import { formatRewrite, jsonResult } from "./formatting.js";

export function registerRefineTextTool(server: McpServer, service: SuggestionService) {
  server.registerTool(
    "refine_text",
    {
      title: "Refine Text",
      description: "Rewrites the selected text in the wording of the closest indexed material.",
      inputSchema: {
        selected_text: z.string().min(1).describe("Text to rewrite"),
        context_text: z.string().optional().describe("Text around the selection"),
      },
    },
    async ({ selected_text, context_text }) =>
      jsonResult(formatRewrite(await service.refineText(selected_text, context_text ?? ""))),
  );
}
