/**
 * CurveFund Logger
 * Structured logging with Pino
 */

import pino, { type Logger, type LoggerOptions } from "pino";

// ============================================
// LOGGER CONFIGURATION
// ============================================

const isDevelopment = process.env.NODE_ENV === "development";
const logLevel = process.env.LOG_LEVEL || "info";
const logFormat = process.env.LOG_FORMAT || "json";

export const loggerOptions: LoggerOptions = {
  level: logLevel,
  base: {
    service: "curvefund",
    env: process.env.NODE_ENV || "production",
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      service: bindings.service,
      env: bindings.env,
    }),
  },
  redact: {
    paths: [
      "*.privateKey",
      "*.password",
      "*.secret",
      "*.apiKey",
    ],
    censor: "[REDACTED]",
  },
};

// Pretty printing for development
const devOptions: LoggerOptions = {
  ...loggerOptions,
  transport: {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
      messageFormat: "{msg}",
    },
  },
};

// ============================================
// LOGGER INSTANCE
// ============================================

export const logger: Logger =
  isDevelopment && logFormat === "pretty"
    ? pino(devOptions)
    : pino(loggerOptions);

// ============================================
// CHILD LOGGERS FOR SERVICES
// ============================================

export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service: serviceName });
}

// Pre-configured service loggers
export const engineLogger = createServiceLogger("engine");
export const rewardsLogger = createServiceLogger("rewards");

// ============================================
// STRUCTURED LOG HELPERS
// ============================================

interface FundMovementLogContext {
  campaignId?: number;
  from?: string;
  to?: string;
  amount: bigint;
  stream?: string;
}

/**
 * Logs a movement of settlement funds with structured context
 */
export function logFundMovement(
  level: "info" | "warn" | "error",
  event: string,
  context: FundMovementLogContext,
  message?: string
): void {
  engineLogger[level](
    {
      event,
      funds: { ...context, amount: context.amount.toString() },
    },
    message || event
  );
}

// ============================================
// AUDIT LOGGING
// ============================================

interface AuditLogEntry {
  action: string;
  entityType: string;
  entityId?: string;
  actor: string;
  details?: Record<string, unknown>;
}

/**
 * Creates an audit log entry for privileged or one-time transitions
 */
export function audit(entry: AuditLogEntry): void {
  logger.info(
    {
      audit: true,
      ...entry,
      timestamp: new Date().toISOString(),
    },
    `AUDIT: ${entry.action} on ${entry.entityType}${entry.entityId ? ` (${entry.entityId})` : ""} by ${entry.actor}`
  );
}

// ============================================
// ERROR LOGGING
// ============================================

/**
 * Logs an error with stack trace and context
 */
export function logError(
  error: Error,
  context?: Record<string, unknown>,
  message?: string
): void {
  logger.error(
    {
      err: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      ...context,
    },
    message || error.message
  );
}

// ============================================
// PERFORMANCE LOGGING
// ============================================

/**
 * Creates a timer for measuring operation duration
 */
export function createTimer(operationName: string): () => void {
  const start = performance.now();

  return () => {
    const duration = performance.now() - start;
    logger.debug(
      {
        operation: operationName,
        durationMs: duration.toFixed(2),
      },
      `${operationName} completed in ${duration.toFixed(2)}ms`
    );
  };
}

/**
 * Wraps an async function with timing
 */
export async function withTiming<T>(
  operationName: string,
  fn: () => Promise<T>
): Promise<T> {
  const done = createTimer(operationName);
  try {
    const result = await fn();
    done();
    return result;
  } catch (error) {
    done();
    throw error;
  }
}
