import type { FastifyInstance } from 'fastify';
import type { AxiosInstance } from 'axios';
import { createLogAnalyticsScaler, type LogAnalyticsScaler } from '../services/scaler.service.js';
import type { TokenManager } from '../services/token-manager.service.js';
import type { ScaledObjectRef } from '../types/scaler.types.js';

export interface ScalerRoutesOptions {
  tokenManager: TokenManager;
  resolvedEnv: Record<string, string | undefined>;
  http?: AxiosInstance;
  baseUrl?: string;
}

interface MetricsRequestBody {
  scaledObjectRef: ScaledObjectRef;
  metricName: string;
}

const stringMapSchema = {
  type: 'object',
  additionalProperties: { type: 'string' },
} as const;

const scaledObjectRefSchema = {
  type: 'object',
  required: ['name', 'namespace', 'scalerMetadata'],
  properties: {
    name: { type: 'string', minLength: 1 },
    namespace: { type: 'string' },
    scalerMetadata: stringMapSchema,
    authParams: stringMapSchema,
    podIdentity: { type: 'string' },
  },
} as const;

const errorSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    message: { type: 'string' },
  },
} as const;

/**
 * External scaler routes
 *
 * Every request is one reconciliation cycle: a new scaler instance is built
 * for it, sharing the process-wide token store through the TokenManager.
 */
export async function scalerRoutes(fastify: FastifyInstance, options: ScalerRoutesOptions) {
  const buildScaler = (ref: ScaledObjectRef): LogAnalyticsScaler =>
    createLogAnalyticsScaler({
      name: ref.name,
      namespace: ref.namespace,
      input: {
        metadata: ref.scalerMetadata,
        authParams: ref.authParams,
        resolvedEnv: options.resolvedEnv,
        podIdentity: ref.podIdentity,
      },
      tokenManager: options.tokenManager,
      http: options.http,
      baseUrl: options.baseUrl,
    });

  const withScaler = async <T>(ref: ScaledObjectRef, action: (scaler: LogAnalyticsScaler) => Promise<T>): Promise<T> => {
    const scaler = buildScaler(ref);
    try {
      return await action(scaler);
    } finally {
      await scaler.close();
    }
  };

  // POST /scaler/is-active - Should the workload be scaled from zero?
  fastify.post<{ Body: ScaledObjectRef }>('/scaler/is-active', {
    schema: {
      description: 'Runs the query and reports whether the metric value is above zero',
      tags: ['Scaler'],
      body: scaledObjectRefSchema,
      response: {
        200: {
          type: 'object',
          properties: { result: { type: 'boolean' } },
        },
        '4xx': errorSchema,
        '5xx': errorSchema,
      },
    },
  }, async (request) => {
    const result = await withScaler(request.body, (scaler) => scaler.isActive());
    return { result };
  });

  // POST /scaler/metric-spec - Metric target for the autoscaler
  fastify.post<{ Body: ScaledObjectRef }>('/scaler/metric-spec', {
    schema: {
      description: 'Returns the external metric name and its target value (empty on query failure)',
      tags: ['Scaler'],
      body: scaledObjectRefSchema,
      response: {
        200: {
          type: 'object',
          properties: {
            metricSpecs: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  metricName: { type: 'string' },
                  targetSize: { type: 'number' },
                },
              },
            },
          },
        },
        '4xx': errorSchema,
      },
    },
  }, async (request) => {
    const specs = await withScaler(request.body, (scaler) => scaler.getMetricSpecForScaling());
    return {
      metricSpecs: specs.map((spec) => ({ metricName: spec.metricName, targetSize: spec.targetAverageValue })),
    };
  });

  // POST /scaler/metrics - Current metric value, always freshly queried
  fastify.post<{ Body: MetricsRequestBody }>('/scaler/metrics', {
    schema: {
      description: 'Runs the query and returns the current metric value',
      tags: ['Scaler'],
      body: {
        type: 'object',
        required: ['scaledObjectRef', 'metricName'],
        properties: {
          scaledObjectRef: scaledObjectRefSchema,
          metricName: { type: 'string', minLength: 1 },
        },
      },
      response: {
        200: {
          type: 'object',
          properties: {
            metricValues: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  metricName: { type: 'string' },
                  metricValue: { type: 'number' },
                  timestamp: { type: 'string', format: 'date-time' },
                },
              },
            },
          },
        },
        '4xx': errorSchema,
        '5xx': errorSchema,
      },
    },
  }, async (request) => {
    const { scaledObjectRef, metricName } = request.body;
    const values = await withScaler(scaledObjectRef, (scaler) => scaler.getMetrics(metricName));
    return {
      metricValues: values.map((value) => ({
        metricName: value.metricName,
        metricValue: value.value,
        timestamp: value.timestamp,
      })),
    };
  });
}
