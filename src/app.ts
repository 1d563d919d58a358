import Fastify, { type FastifyInstance } from 'fastify';
import type { AxiosInstance } from 'axios';
import { config } from './config/env.js';
import { httpStatusForError } from './errors/index.js';
import { createAuthProvider } from './providers/auth-provider.factory.js';
import { scalerRoutes } from './routes/scaler.routes.js';
import { TokenManager } from './services/token-manager.service.js';
import { tokenStore as defaultTokenStore, type TokenStore } from './services/token-store.service.js';
import { metrics } from './services/metrics.service.js';
import { logger } from './services/logger.service.js';

export interface BuildServerOptions {
  tokenStore?: TokenStore;
  tokenManager?: TokenManager;
  resolvedEnv?: Record<string, string | undefined>;
  http?: AxiosInstance;
  baseUrl?: string;
  logger?: boolean;
}

/**
 * Builds the scaler API (not listening yet)
 */
export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const store = options.tokenStore ?? defaultTokenStore;
  const tokenManager =
    options.tokenManager ??
    new TokenManager({
      store,
      providerFactory: (credentials) => createAuthProvider(credentials, { http: options.http }),
    });

  const fastify = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
  });

  // Metrics tracking
  fastify.addHook('onResponse', async (request, reply) => {
    const route = request.routeOptions.url || request.url;
    metrics.recordHttpRequest(request.method, route, reply.statusCode, reply.elapsedTime / 1000);
  });

  fastify.setErrorHandler(async (error, request, reply) => {
    let statusCode = httpStatusForError(error);
    if (statusCode === 500 && typeof error.statusCode === 'number' && error.statusCode < 500) {
      statusCode = error.statusCode;
    }

    if (statusCode >= 500) {
      logger.error('Scaler request failed', { route: request.url, http_status: statusCode, error });
    } else {
      logger.warn('Scaler request rejected', { route: request.url, http_status: statusCode, error: error.message });
    }

    reply.code(statusCode);
    return { error: error.name, message: error.message };
  });

  await fastify.register(scalerRoutes, {
    tokenManager,
    resolvedEnv: options.resolvedEnv ?? process.env,
    http: options.http,
    baseUrl: options.baseUrl,
  });

  // Health check endpoint
  fastify.get('/health', {
    schema: {
      description: 'Health check endpoint - reports token refresh status',
      tags: ['Health'],
    },
  }, async () => {
    const stats = tokenManager.getStats();
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      tokenManager: {
        totalRefreshes: stats.totalRefreshes,
        lastRefreshAt: stats.lastRefreshAt ? new Date(stats.lastRefreshAt * 1000).toISOString() : null,
        lastError: stats.lastError,
      },
      tokenStore: {
        entries: store.size,
      },
    };
  });

  // Metrics endpoint
  fastify.get('/metrics', {
    schema: {
      description: 'Prometheus metrics endpoint - returns metrics in Prometheus text format',
      tags: ['Health'],
    },
  }, async (_request, reply) => {
    try {
      const metricsOutput = await metrics.getMetrics();
      reply.type(metrics.getContentType());
      return metricsOutput;
    } catch (error) {
      logger.error('Failed to generate metrics', { error });
      reply.code(500);
      return { error: 'Failed to generate metrics' };
    }
  });

  return fastify;
}
