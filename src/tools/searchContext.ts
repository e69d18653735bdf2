import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SuggestionService } from "../services/suggestionService.js";
import { formatRetrieval, jsonResult } from "./formatting.js";

export function registerSearchContextTool(server: McpServer, service: SuggestionService) {
  server.registerTool(
    "search_context",
    {
      title: "Search Context",
      description:
        "Retrieves context for a query: local chunks first, online results only when nothing local is similar enough.",
      inputSchema: {
        query: z.string().min(1).describe("Search query"),
        top_k: z.number().int().min(1).max(20).optional().describe("Max results"),
      },
    },
    async ({ query, top_k }) => jsonResult(formatRetrieval(await service.retrieveContext(query, top_k))),
  );
}
