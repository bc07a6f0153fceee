/**
 * Centralized Configuration Module
 *
 * All environment variables and configuration settings are managed here.
 * This ensures type safety and provides defaults for development.
 */

import dotenv from "dotenv";
import path from "path";

// Load environment variables
dotenv.config();

export type NotifierBackend = "local" | "redis";

function parseNotifierBackend(value: string | undefined): NotifierBackend {
  const backend = (value || "local").trim().toLowerCase();
  if (backend !== "local" && backend !== "redis") {
    throw new Error(`NOTIFIER_BACKEND must be "local" or "redis", got "${backend}"`);
  }
  return backend;
}

// =============================================================================
// Configuration Object
// =============================================================================

export const config = {
  // Server
  nodeEnv: process.env.NODE_ENV || "development",
  port: parseInt(process.env.PORT || "8000", 10),
  isProduction: process.env.NODE_ENV === "production",
  isDevelopment: process.env.NODE_ENV === "development",
  logLevel: process.env.LOG_LEVEL || (process.env.NODE_ENV === "production" ? "info" : "debug"),

  // Database
  mongodbUri: process.env.MONGODB_URI || "mongodb://localhost:27017/tronbyt",

  // Render cache
  dataDir: path.resolve(process.env.DATA_DIR || "./data"),
  defaultImagePath: path.resolve(
    process.env.DEFAULT_IMAGE_PATH || path.join(__dirname, "..", "..", "assets", "default.webp")
  ),

  // Renderer
  pixletPath: process.env.PIXLET_PATH || "pixlet",
  renderTimeoutMs: parseInt(process.env.RENDER_TIMEOUT_MS || "30000", 10),

  // Cross-process notifications
  notifierBackend: parseNotifierBackend(process.env.NOTIFIER_BACKEND),
  redisUrl: process.env.REDIS_URL || "",

  // Device WebSocket protocol
  websocket: {
    minAckTimeoutSecs: parseInt(process.env.WS_MIN_ACK_TIMEOUT_SECS || "25", 10),
    pollIntervalMs: parseInt(process.env.WS_POLL_INTERVAL_MS || "1000", 10),
    pushDwellSecs: parseInt(process.env.PUSH_DWELL_SECS || "5", 10),
  },

  // CORS
  corsOrigins: process.env.CORS_ORIGINS?.split(",").map(origin => origin.trim()) || [
    "http://localhost:3000",
    "http://localhost:5173",
  ],

  // Rate Limiting
  rateLimitWindowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || "900000", 10), // 15 minutes
  rateLimitMaxRequests: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || "300", 10),

  // Push uploads
  upload: {
    maxFileSize: parseInt(process.env.MAX_PUSH_IMAGE_BYTES || String(2 * 1024 * 1024), 10), // 2MB
    allowedMimeTypes: ["image/webp"],
  },
};

export type AppConfig = typeof config;

// =============================================================================
// Validation
// =============================================================================

/**
 * Validates that all required environment variables are set
 * Throws an error in production if required vars are missing
 */
export function validateConfig(): void {
  const requiredVars = ["MONGODB_URI"];
  const missingVars: string[] = [];

  if (config.notifierBackend === "redis") {
    requiredVars.push("REDIS_URL");
  }

  for (const varName of requiredVars) {
    if (!process.env[varName]) {
      missingVars.push(varName);
    }
  }

  if (missingVars.length > 0) {
    const message = `Missing required environment variables: ${missingVars.join(", ")}`;
    // A redis notifier cannot start without its URL, whatever the environment
    if (config.isProduction || missingVars.includes("REDIS_URL")) {
      throw new Error(message);
    } else {
      console.warn(`⚠️  Warning: ${message}`);
    }
  }
}

// =============================================================================
// Export
// =============================================================================

export default config;
