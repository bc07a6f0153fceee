/**
 * Pixel display fleet server
 *
 * Rotates installed apps on each device and delivers rendered frames over
 * HTTP polling or a persistent WebSocket.
 */

import http from "http";
import mongoose from "mongoose";

import { config, validateConfig } from "./config";
import { createApp } from "./app";
import { createServices } from "./services";
import { MongoDeviceStore } from "./services/deviceStore";
import { createNotifier } from "./services/notifier";
import { PixletRenderer } from "./services/renderer";
import { DeviceSocketServer } from "./websocket/server";
import { errorMessage } from "./utils/errors";
import { logger } from "./utils/logger";

// Make sure the model is registered
import "./models/Device";

// =============================================================================
// Validate Configuration
// =============================================================================
validateConfig();

// =============================================================================
// Services
// =============================================================================
const notifier = createNotifier(config);
const services = createServices(config, {
  store: new MongoDeviceStore(),
  renderer: new PixletRenderer(config.pixletPath, config.renderTimeoutMs),
  notifier,
});

const app = createApp(services);
const server = http.createServer(app);

const sockets = new DeviceSocketServer({
  store: services.store,
  delivery: services.delivery,
  notifier,
  settings: {
    minAckTimeoutSecs: config.websocket.minAckTimeoutSecs,
    pollIntervalMs: config.websocket.pollIntervalMs,
  },
});
sockets.attach(server);

// =============================================================================
// Database Connection
// =============================================================================
mongoose
  .connect(config.mongodbUri)
  .then(() => {
    logger.info({ database: config.mongodbUri.split("/").pop()?.split("?")[0] }, "Connected to MongoDB");
  })
  .catch((error: unknown) => {
    logger.error({ error: errorMessage(error) }, "MongoDB connection error");
    if (config.isProduction) {
      process.exit(1);
    }
  });

mongoose.connection.on("disconnected", () => {
  logger.warn("MongoDB disconnected");
});

mongoose.connection.on("reconnected", () => {
  logger.info("MongoDB reconnected");
});

// =============================================================================
// Server Startup
// =============================================================================
server.listen(config.port, () => {
  logger.info(
    { port: config.port, env: config.nodeEnv, notifier: config.notifierBackend, dataDir: config.dataDir },
    `Server listening on http://localhost:${config.port}`
  );
});

// =============================================================================
// Graceful Shutdown
// =============================================================================
const gracefulShutdown = async (signal: string): Promise<void> => {
  logger.info(`${signal} received. Shutting down gracefully...`);

  // Force close after 10s
  const forceExit = setTimeout(() => {
    logger.error("Forcefully shutting down");
    process.exit(1);
  }, 10000);
  forceExit.unref();

  try {
    await sockets.close();
    logger.info("Device sessions closed");

    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    logger.info("HTTP server closed");

    await notifier.close();
    await mongoose.connection.close(false);
    logger.info("MongoDB connection closed");
    process.exit(0);
  } catch (error) {
    logger.error({ error: errorMessage(error) }, "Error during shutdown");
    process.exit(1);
  }
};

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

export default app;
