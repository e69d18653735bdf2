import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SuggestionService } from "../services/suggestionService.js";
import { jsonResult } from "./formatting.js";

export function registerRebuildIndexTool(server: McpServer, service: SuggestionService) {
  server.registerTool(
    "rebuild_index",
    {
      title: "Rebuild Index",
      description: "Clears the index and re-indexes every document under DOCUMENTS_DIR.",
      inputSchema: {},
    },
    async () => jsonResult(await service.rebuildIndex()),
  );
}
