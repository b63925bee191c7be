import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createApplication } from "./app.js";
import { loadConfig } from "./config/env.js";
import { createHttpApi, listen } from "./http/httpApi.js";
import { createMcpServer } from "./mcpServer.js";
import { configureLogger, getLogger } from "./utils/logger.js";

async function main() {
  const config = loadConfig();
  const logger = configureLogger(config.logging);
  const app = await createApplication(config, logger);
  const shutdownTasks: Array<() => Promise<void>> = [app.close];

  if (config.transport === "http") {
    const server = createHttpApi(
      app.service,
      app.monitoring,
      { maxUploadBytes: config.http.maxUploadBytes },
      logger,
    );
    const stopHttpServer = await listen(server, config.http.host, config.http.port);
    shutdownTasks.unshift(stopHttpServer);
    logger.info(
      { host: config.http.host, port: config.http.port, store: config.index.store },
      "Legal RAG HTTP API listening",
    );
  } else {
    const mcpServer = createMcpServer(app.service);
    await mcpServer.connect(new StdioServerTransport());
    shutdownTasks.unshift(() => mcpServer.close());
    logger.info({ store: config.index.store }, "Legal RAG MCP server running on stdio");
  }

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, "Shutting down");
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  getLogger().fatal({ err: error }, "Failed to start legal RAG server");
  process.exit(1);
});
