import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SuggestionService } from "../services/suggestionService.js";
import { jsonResult } from "./formatting.js";

export function registerRemoveDocumentTool(server: McpServer, service: SuggestionService) {
  server.registerTool(
    "remove_document",
    {
      title: "Remove Document",
      description: "Removes a document and all of its chunks from the index.",
      inputSchema: {
        source: z.string().min(1).describe("Document reference as shown by list_sources"),
      },
    },
    async ({ source }) => {
      const removedChunks = await service.removeDocument(source);
      return jsonResult({ source, removed: removedChunks > 0, removed_chunks: removedChunks });
    },
  );
}
