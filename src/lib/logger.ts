import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

export function createLogger(level: string = process.env.LOG_LEVEL ?? "info"): Logger {
  return pino({
    level,
    // JSON to stdout; no transports
  });
}

export function createChildLogger(
  logger: Logger,
  context: { deliveryId?: string | null; eventName?: string; [key: string]: unknown },
): Logger {
  return logger.child(context);
}
