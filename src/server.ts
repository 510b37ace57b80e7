import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createAppServices } from "./app.js";
import { loadConfig } from "./config/env.js";
import { createHttpApi, MCP_PATH, startHttpServer } from "./http/httpApi.js";
import { createMcpServer } from "./mcpServer.js";
import { createLogger, setLogLevel } from "./utils/logger.js";

const logger = createLogger("server");

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const services = await createAppServices(config);
  const shutdownTasks: Array<() => Promise<void>> = [services.close];

  const status = await services.collections.status(config.collectionName);
  if (!status.exists) {
    logger.warn("Collection does not exist yet; chat requests will fail until it is created", {
      collection: config.collectionName,
    });
  }

  if (config.transport === "http") {
    const api = createHttpApi({
      collectionName: config.collectionName,
      collections: services.collections,
      chat: services.chat,
      corsOrigin: config.corsOrigin,
      mcpServerFactory: () => createMcpServer(services),
    });
    const running = await startHttpServer(api, config.host, config.port);
    shutdownTasks.unshift(running.close);
    logger.info(`HTTP server listening on http://${config.host}:${running.port}`, {
      chat: "/chat/stream",
      mcp: MCP_PATH,
      store: config.vectorStore,
    });
  } else {
    await createMcpServer(services).connect(new StdioServerTransport());
    logger.info("MCP stdio server ready", { store: config.vectorStore });
  }

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error("Shutdown failed", error);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error) => {
  logger.error("Failed to start server", error);
  process.exit(1);
});
