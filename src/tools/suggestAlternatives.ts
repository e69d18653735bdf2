import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SuggestionService } from "../services/suggestionService.js";
import { formatRetrieval, jsonResult } from "./formatting.js";

export function registerSuggestAlternativesTool(server: McpServer, service: SuggestionService) {
  server.registerTool(
    "suggest_alternatives",
    {
      title: "Suggest Alternatives",
      description: "Lists other phrasings of the selected text taken from retrieved sentences.",
      inputSchema: {
        selected_text: z.string().min(1).describe("Text to find alternatives for"),
        count: z.number().int().min(1).max(10).optional().describe("How many alternatives (default 3)"),
      },
    },
    async ({ selected_text, count }) => {
      const { alternatives, retrieval } = await service.alternatives(selected_text, count ?? 3);
      return jsonResult({ alternatives, retrieval: formatRetrieval(retrieval) });
    },
  );
}
