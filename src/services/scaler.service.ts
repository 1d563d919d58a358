import type { AxiosInstance } from 'axios';
import { scalerConstants } from '../config/config.js';
import { parseScalerMetadata } from '../config/scaler-metadata.js';
import { ConfigError, getErrorMessage } from '../errors/index.js';
import { QueryExecutor } from './query-executor.service.js';
import type { TokenManager } from './token-manager.service.js';
import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';
import type { MetricSample } from '../types/query.types.js';
import type {
  ExternalMetricSpec,
  ExternalMetricValue,
  ScalerMetadata,
  ScalerMetadataInput,
  SessionCache,
} from '../types/scaler.types.js';
import type { Credentials } from '../types/token.types.js';

/**
 * Anything that can turn the configured query into a metric sample
 */
export interface MetricQueryRunner {
  run(query: string, credentials: Credentials, signal?: AbortSignal): Promise<MetricSample>;
}

export interface LogAnalyticsScalerOptions {
  name: string;
  namespace: string;
  metadata: ScalerMetadata;
  runner: MetricQueryRunner;
  logger?: StructuredLogger;
}

/**
 * Replaces characters that are not allowed in external metric names
 */
export function normalizeMetricName(value: string): string {
  return value.replace(/[/.:%]/g, '-');
}

/**
 * Log Analytics Scaler
 *
 * Pull-based metrics contract for one scaled object.
 *
 * An instance covers one reconciliation cycle: isActive and
 * getMetricSpecForScaling share a single query through the session cache,
 * getMetrics always queries again. Create a new instance per cycle.
 */
export class LogAnalyticsScaler {
  readonly name: string;
  readonly namespace: string;
  private readonly metadata: ScalerMetadata;
  private readonly runner: MetricQueryRunner;
  private readonly logger: StructuredLogger;
  private readonly cache: SessionCache = { metricValue: -1, metricThreshold: -1 };

  constructor(options: LogAnalyticsScalerOptions) {
    this.name = options.name;
    this.namespace = options.namespace;
    this.metadata = options.metadata;
    this.runner = options.runner;
    this.logger = (options.logger ?? defaultLogger).child({ scaler: options.name, namespace: options.namespace });
  }

  /**
   * Whether the workload should be scaled up from zero
   */
  async isActive(signal?: AbortSignal): Promise<boolean> {
    await this.updateCache(signal);
    return this.cache.metricValue > 0;
  }

  /**
   * Metric target for the autoscaler, empty when the query fails
   */
  async getMetricSpecForScaling(signal?: AbortSignal): Promise<ExternalMetricSpec[]> {
    try {
      await this.updateCache(signal);
    } catch (error) {
      this.logger.metricSpecFailed({ scaler: this.name, namespace: this.namespace, error: getErrorMessage(error) });
      return [];
    }

    return [
      {
        metricName: this.getMetricName(),
        targetType: 'AverageValue',
        targetAverageValue: this.cache.metricThreshold,
      },
    ];
  }

  /**
   * Current metric value, always queried fresh
   */
  async getMetrics(metricName: string, signal?: AbortSignal): Promise<ExternalMetricValue[]> {
    const sample = await this.fetchMetric(signal);
    return [
      {
        metricName,
        value: sample.value,
        timestamp: new Date().toISOString(),
      },
    ];
  }

  getMetricName(): string {
    return normalizeMetricName(`${scalerConstants.metricNamePrefix}-${this.metadata.workspaceId}`);
  }

  async close(): Promise<void> {
    // Nothing to release: HTTP connections are not pooled per scaler
  }

  private async updateCache(signal?: AbortSignal): Promise<void> {
    if (this.cache.metricValue >= 0) {
      return;
    }

    const sample = await this.fetchMetric(signal);
    this.cache.metricValue = sample.value;
    this.cache.metricThreshold = sample.threshold > 0 ? sample.threshold : this.metadata.threshold;
  }

  private async fetchMetric(signal?: AbortSignal): Promise<MetricSample> {
    const sample = await this.runner.run(this.metadata.query, this.metadata.credentials, signal);
    this.logger.metricProvided({
      scaler: this.name,
      namespace: this.namespace,
      value: sample.value,
      threshold: sample.threshold,
    });
    return sample;
  }
}

export interface CreateScalerOptions {
  name: string;
  namespace: string;
  input: ScalerMetadataInput;
  tokenManager: TokenManager;
  http?: AxiosInstance;
  baseUrl?: string;
  logger?: StructuredLogger;
}

/**
 * Parses the scaler configuration and wires the query executor
 * @throws ConfigError when the configuration is incomplete
 */
export function createLogAnalyticsScaler(options: CreateScalerOptions): LogAnalyticsScaler {
  let metadata: ScalerMetadata;
  try {
    metadata = parseScalerMetadata(options.input);
  } catch (error) {
    throw new ConfigError(
      `Failed to initialize Log Analytics scaler. Scaled object: ${options.name}. Namespace: ${options.namespace}. ${getErrorMessage(error)}`,
      error
    );
  }

  const runner = new QueryExecutor({
    workspaceId: metadata.workspaceId,
    tokenManager: options.tokenManager,
    http: options.http,
    baseUrl: options.baseUrl,
    logger: options.logger,
  });

  return new LogAnalyticsScaler({
    name: options.name,
    namespace: options.namespace,
    metadata,
    runner,
    logger: options.logger,
  });
}
