/**
 * Express application: security middleware, the device polling routes, the
 * `/v0` management API and the health check. The WebSocket endpoint is
 * attached to the HTTP server separately (see `websocket/server.ts`).
 */

import express, { Express } from "express";
import cors from "cors";
import mongoose from "mongoose";
import helmet from "helmet";
import compression from "compression";
import rateLimit from "express-rate-limit";

import { config } from "./config";
import type { Services } from "./services";
import { deviceRoutes } from "./routes/device.routes";
import { apiRoutes } from "./routes/api.routes";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";

export interface AppOptions {
  /** Reports whether the database is reachable; defaults to the mongoose connection state. */
  isDatabaseConnected?: () => boolean;
}

export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  if (days > 0) {
    return `${days}d ${hours}h ${minutes}m ${secs}s`;
  } else if (hours > 0) {
    return `${hours}h ${minutes}m ${secs}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${secs}s`;
  } else {
    return `${secs}s`;
  }
}

export function createApp(services: Services, options: AppOptions = {}): Express {
  const isDatabaseConnected = options.isDatabaseConnected ?? (() => mongoose.connection.readyState === 1);
  const app = express();

  // ===========================================================================
  // Security Middleware
  // ===========================================================================

  app.use(
    helmet({
      crossOriginResourcePolicy: { policy: "cross-origin" },
    })
  );

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // Devices and scripts send no origin
      if (!origin) {
        return callback(null, true);
      }
      if (config.corsOrigins.includes(origin) || config.isDevelopment) {
        return callback(null, true);
      }
      callback(new Error("Not allowed by CORS"));
    },
    credentials: true,
    methods: ["GET", "POST", "DELETE", "PATCH", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "X-Requested-With", "X-Firmware-Version", "If-None-Match"],
    exposedHeaders: ["Tronbyt-Brightness", "Tronbyt-Dwell-Secs", "ETag"],
  };
  app.use(cors(corsOptions));

  // Management API only; devices poll the root routes continuously
  const limiter = rateLimit({
    windowMs: config.rateLimitWindowMs,
    max: config.rateLimitMaxRequests,
    message: {
      success: false,
      message: "Too many requests, please try again later.",
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use("/v0/", limiter);

  // ===========================================================================
  // Body Parsing
  // ===========================================================================

  // Base64 images inflate by a third
  app.use(express.json({ limit: Math.ceil(config.upload.maxFileSize * 1.4) }));
  app.use(compression());

  // ===========================================================================
  // Routes
  // ===========================================================================

  app.get("/health", (req, res) => {
    const connected = isDatabaseConnected();
    res.status(connected ? 200 : 503).json({
      status: connected ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      environment: config.nodeEnv,
      uptime: process.uptime(),
      uptimeFormatted: formatUptime(process.uptime()),
      services: {
        database: {
          status: connected ? "connected" : "disconnected",
        },
        notifier: config.notifierBackend,
      },
    });
  });

  app.use("/v0", apiRoutes(services));
  app.use("/", deviceRoutes(services));

  // ===========================================================================
  // Error Handling
  // ===========================================================================

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
