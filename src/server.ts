import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createAppServer } from "./appServer.js";
import { loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import { createSuggestionService } from "./services/createSuggestionService.js";
import { listenHttp, MCP_PATH, McpHttpGateway } from "./transport/httpGateway.js";
import { createLogger } from "./utils/logger.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger("suggest", config.logLevel);
  const { service, aiClient, close } = await createSuggestionService(config, { logger });
  const shutdownTasks: Array<() => Promise<void>> = [close];

  logger.info("suggestion engine ready", {
    embedding_provider: aiClient.getEmbeddingProvider(),
    generation_provider: aiClient.getGenerationProvider(),
    online_search: config.onlineSearchEnabled,
    ...(await service.getIndexStats()),
  });

  if (config.transport === "http") {
    const gateway = new McpHttpGateway({
      serverFactory: () => createAppServer(service, aiClient),
      maxBodyBytes: config.maxBodyBytes,
      logger: logger.child("http"),
    });
    const stopHttpServer = await listenHttp(gateway, config.host, config.port);
    shutdownTasks.unshift(stopHttpServer);
    logger.info(`MCP HTTP server listening on http://${config.host}:${config.port}${MCP_PATH}`);
  } else {
    await runStdioServer(createAppServer(service, aiClient));
  }

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    try {
      for (const task of shutdownTasks) {
        await task();
      }
      process.exit(0);
    } catch (error) {
      logger.error("shutdown failed", { reason: describeError(error) });
      process.exit(1);
    }
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error: unknown) => {
  console.error("Failed to start MCP server:", error);
  process.exit(1);
});
