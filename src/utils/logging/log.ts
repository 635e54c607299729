import { getLogger, type LogContext } from "./logger";

export function logInfo(message: string, data?: unknown, context?: LogContext): void {
  getLogger().info({ ...context, data }, message);
}

export function logWarn(message: string, data?: unknown, context?: LogContext): void {
  getLogger().warn({ ...context, data }, message);
}

export function logDebug(message: string, data?: unknown, context?: LogContext): void {
  getLogger().debug({ ...context, data }, message);
}

export function logError(message: string, error?: unknown, context?: LogContext): void {
  getLogger().error({ ...context, err: error }, message);
}
