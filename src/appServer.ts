import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { AiClient } from "./infra/ai/types.js";
import { SuggestionService } from "./services/suggestionService.js";
import { registerCancelSuggestionTool } from "./tools/cancelSuggestion.js";
import { jsonResult } from "./tools/formatting.js";
import { registerExpandTextTool } from "./tools/expandText.js";
import { registerGetSuggestionTool } from "./tools/getSuggestion.js";
import { registerIndexDocumentsTool } from "./tools/indexDocuments.js";
import { registerIndexTextTool } from "./tools/indexText.js";
import { registerListSourcesTool } from "./tools/listSources.js";
import { registerRebuildIndexTool } from "./tools/rebuildIndex.js";
import { registerRefineTextTool } from "./tools/refineText.js";
import { registerRemoveDocumentTool } from "./tools/removeDocument.js";
import { registerSearchContextTool } from "./tools/searchContext.js";
import { registerSuggestAlternativesTool } from "./tools/suggestAlternatives.js";
import { registerSuggestCompletionTool } from "./tools/suggestCompletion.js";

export const SERVER_NAME = "local-first-suggest";
export const SERVER_VERSION = "0.1.0";

export function createAppServer(service: SuggestionService, aiClient: AiClient): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns server status, providers and index statistics.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return jsonResult({
        status: "ok",
        message: `${SERVER_NAME} is running. hello ${who}`,
        embedding_provider: aiClient.getEmbeddingProvider(),
        generation_provider: aiClient.getGenerationProvider(),
        generation_available: aiClient.isAvailable(),
        stats: await service.getIndexStats(),
      });
    },
  );

  registerIndexDocumentsTool(server, service);
  registerIndexTextTool(server, service);
  registerRemoveDocumentTool(server, service);
  registerListSourcesTool(server, service);
  registerSearchContextTool(server, service);
  registerSuggestCompletionTool(server, service);
  registerCancelSuggestionTool(server, service);
  registerGetSuggestionTool(server, service);
  registerRefineTextTool(server, service);
  registerExpandTextTool(server, service);
  registerSuggestAlternativesTool(server, service);
  registerRebuildIndexTool(server, service);

  return server;
}
