import "dotenv/config";
import http from "http";

import { loadGatewayConfig } from "../config/gatewayConfig.js";
import { createLogger, writeLog } from "../core/logging/createLogger.js";
import { FotowareBackendClient } from "../storage/fotoware/FotowareBackendClient.js";
import { createGatewayApp } from "./gatewayApp.js";

async function startServer() {
  const config = loadGatewayConfig();

  const logger = createLogger(config.logger, {
    filePath: config.logFile,
    level: config.logLevel,
  });

  writeLog(logger, "info", "server environment", { NODE_ENV: config.env });

  if (config.tokens.secretIsEphemeral) {
    writeLog(logger, "warn", "JWT_SECRET not set, using a random per-process secret");
  }

  const backend = new FotowareBackendClient({
    host: config.fotoware.host,
    clientId: config.fotoware.clientId,
    clientSecret: config.fotoware.clientSecret,
    archives: config.fotoware.archives,
    fields: config.fields,
    searchExpressionSuffix: config.fotoware.searchExpressionSuffix,
    publicFilter: config.fotoware.publicFilter,
    timeoutMs: config.fotoware.timeoutMs,
    logger,
  });

  const app = createGatewayApp(config, backend, logger);

  // ---- HTTP server ----
  const server = http.createServer(app);

  server.listen(config.serverPort, () => {
    writeLog(logger, "info", "Gateway started", { port: config.serverPort });
  });

  // ---- Graceful shutdown ----
  const shutdown = (signal: string) => {
    writeLog(logger, "info", "Shutdown initiated", { signal });

    server.close(() => {
      writeLog(logger, "info", "HTTP server closed");
      process.exit(0);
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

startServer().catch(err => {
  console.error("Fatal startup error:", err);
  process.exit(1);
});
