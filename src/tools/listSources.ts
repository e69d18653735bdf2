import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SuggestionService } from "../services/suggestionService.js";
import { jsonResult } from "./formatting.js";

export function registerListSourcesTool(server: McpServer, service: SuggestionService) {
  server.registerTool(
    "list_sources",
    {
      title: "List Sources",
      description: "Lists indexed documents and index statistics.",
      inputSchema: {},
    },
    async () =>
      jsonResult({
        sources: service.listSources(),
        stats: await service.getIndexStats(),
      }),
  );
}
