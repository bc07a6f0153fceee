import pino from "pino";
import { config } from "../config";

/**
 * Root logger. Pretty-printed outside production, plain JSON lines otherwise.
 * Modules should take a child: `logger.child({ service: "rotation" })`.
 */
const baseLoggerOptions: pino.LoggerOptions = {
  level: config.logLevel,
  base: {
    env: config.nodeEnv,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

function createRootLogger(): pino.Logger {
  // Jest workers cannot host the pretty transport's worker thread
  if (process.env.JEST_WORKER_ID !== undefined) {
    return pino({ ...baseLoggerOptions, level: "silent" });
  }
  if (config.isProduction) {
    return pino(baseLoggerOptions);
  }

  const prettyTransport = pino.transport({
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname,env",
      messageFormat: "{msg}",
      errorProps: "*",
    },
  });

  return pino(baseLoggerOptions, prettyTransport);
}

export const logger = createRootLogger();

export type Logger = pino.Logger;

export default logger;
