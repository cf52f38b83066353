import "dotenv/config";
import express from "express";
import { loadConfig } from "./config/env";
import { createGateway } from "./mcp";
import { registerRoutes } from "./routes";
import { logError } from "./utils/errorHandler";
import { configureLogger, logInfo } from "./utils/logger";

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogger({
    level: config.logLevel,
    ...(config.logDir !== undefined && { logDir: config.logDir }),
  });

  const gateway = createGateway(config);

  const app = express();
  app.use(express.json());

  const server = registerRoutes(app, gateway);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logInfo(`[Server] ${signal} received, closing provider session`);
    await gateway.sessions.disconnect();
    server.close(() => process.exit(0));
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logError("Server", error);
        process.exit(1);
      });
    });
  }

  server.listen(config.port, config.host, () => {
    logInfo(`[Server] Listening on http://${config.host}:${config.port}`, { target: gateway.target });
  });
}

main().catch((error) => {
  logError("Server", error);
  process.exit(1);
});
