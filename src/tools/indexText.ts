import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SuggestionService } from "../services/suggestionService.js";
import { jsonResult } from "./formatting.js";

export function registerIndexTextTool(server: McpServer, service: SuggestionService) {
  server.registerTool(
    "index_text",
    {
      title: "Index Text",
      description: "Indexes raw text documents supplied inline. Re-sending a source replaces it.",
      inputSchema: {
        documents: z
          .array(
            z.object({
              source: z.string().describe("Name used to attribute suggestions"),
              content: z.string().describe("Document text"),
            }),
          )
          .min(1),
      },
    },
    async ({ documents }) => jsonResult(await service.indexRawDocuments(documents)),
  );
}
