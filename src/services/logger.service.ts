/**
 * Structured Logger Service
 *
 * Structured JSON logging for the scaler.
 *
 * Fields used across events:
 * - timestamp: ISO 8601 timestamp
 * - level: log level (info, warn, error, debug)
 * - event: machine-readable event name
 * - scaler / namespace: scaled object the event belongs to (when applicable)
 * - authMode: servicePrincipal or managedIdentity (when applicable)
 * - http_status: HTTP status code (when applicable)
 * - message: human-readable message
 *
 * Access tokens and client secrets are never logged.
 */

import pino from 'pino';
import { config } from '../config/env.js';

/**
 * Log context for scaler events
 */
export interface ScalerLogContext {
  scaler?: string;
  namespace?: string;
  authMode?: string;
  http_status?: number;
  duration?: number;
  [key: string]: unknown;
}

/**
 * Create base logger instance
 */
const baseLogger = pino({
  level: config.logLevel,

  formatters: {
    level: (label) => {
      return { level: label };
    },
  },

  // Base fields included in every log
  base: {
    service: 'log-analytics-scaler',
    environment: config.nodeEnv,
  },

  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

  // Pretty print in development
  transport: config.nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,
});

/**
 * Masks a token for logging (first 6 and last 4 characters)
 */
export function maskToken(token: string): string {
  if (token.length <= 10) {
    return '***';
  }
  return `${token.substring(0, 6)}...${token.substring(token.length - 4)}`;
}

export class StructuredLogger {
  private logger: pino.Logger;

  constructor(logger: pino.Logger = baseLogger) {
    this.logger = logger;
  }

  /**
   * Creates a child logger with additional context
   */
  child(bindings: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger(this.logger.child(bindings));
  }

  tokenRefreshed(context: ScalerLogContext & { authMode: string; expiresOn: number; token: string }) {
    this.logger.debug({
      event: 'token.refreshed',
      authMode: context.authMode,
      clientId: context.clientId,
      expiresAt: new Date(context.expiresOn * 1000).toISOString(),
      token: maskToken(context.token),
      message: `Token for ${context.authMode} has been refreshed`,
    });
  }

  tokenRefreshFailed(context: ScalerLogContext & { authMode: string; error: string }) {
    this.logger.warn({
      event: 'token.refresh_failed',
      authMode: context.authMode,
      http_status: context.http_status,
      error: context.error,
      message: `Token refresh for ${context.authMode} failed: ${context.error}`,
    });
  }

  /**
   * Logs a wait for a token whose validity starts in the future
   */
  tokenNotReady(context: ScalerLogContext & { delaySeconds: number }) {
    this.logger.debug({
      event: 'token.not_ready',
      authMode: context.authMode,
      delaySeconds: context.delaySeconds,
      message: `Token not ready, waiting ${context.delaySeconds}s`,
    });
  }

  queryRetry(context: ScalerLogContext) {
    this.logger.debug({
      event: 'query.token_expired',
      http_status: context.http_status,
      message: 'Query rejected the token, refreshing and retrying once',
    });
  }

  queryFailed(context: ScalerLogContext & { error: string }) {
    this.logger.warn({
      event: 'query.failed',
      http_status: context.http_status,
      error: context.error,
      duration: context.duration,
      message: `Log Analytics query failed: ${context.error}`,
    });
  }

  metricProvided(context: ScalerLogContext & { value: number; threshold: number }) {
    this.logger.debug({
      event: 'metric.provided',
      scaler: context.scaler,
      namespace: context.namespace,
      value: context.value,
      threshold: context.threshold,
      message: `Providing metric value ${context.value}`,
    });
  }

  metricSpecFailed(context: ScalerLogContext & { error: string }) {
    this.logger.debug({
      event: 'metric_spec.failed',
      scaler: context.scaler,
      namespace: context.namespace,
      error: context.error,
      message: 'Failed to get metric spec',
    });
  }

  info(message: string, context?: ScalerLogContext) {
    this.logger.info({ ...context, message });
  }

  warn(message: string, context?: ScalerLogContext) {
    this.logger.warn({ ...context, message });
  }

  error(message: string, context?: ScalerLogContext & { error?: unknown }) {
    const error = context?.error;
    this.logger.error({
      ...context,
      error: error instanceof Error ? error.message : error,
      stack: error instanceof Error ? error.stack : undefined,
      message,
    });
  }

  debug(message: string, context?: ScalerLogContext) {
    this.logger.debug({ ...context, message });
  }
}

/**
 * Global logger instance
 */
export const logger = new StructuredLogger();
