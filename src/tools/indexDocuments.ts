import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SuggestionService } from "../services/suggestionService.js";
import { jsonResult } from "./formatting.js";

export function registerIndexDocumentsTool(server: McpServer, service: SuggestionService) {
  server.registerTool(
    "index_documents",
    {
      title: "Index Documents",
      description: "Indexes local markdown/text documents as suggestion context.",
      inputSchema: {
        paths: z.array(z.string()).min(1).describe("File paths to index"),
      },
    },
    async ({ paths }) => jsonResult(await service.indexDocuments(paths)),
  );
}
