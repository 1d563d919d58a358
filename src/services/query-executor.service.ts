import axios, { type AxiosInstance } from 'axios';
import { config } from '../config/env.js';
import { scalerConstants } from '../config/config.js';
import { QueryError, getErrorMessage } from '../errors/index.js';
import type { TokenManager } from './token-manager.service.js';
import {
  isQueryDocument,
  resultValidator as defaultValidator,
  type ResultValidator,
} from './result-validator.service.js';
import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';
import { metrics as defaultMetrics, type MetricsService } from './metrics.service.js';
import type { MetricSample, QueryExecutorConfig, QueryHttpResult } from '../types/query.types.js';
import type { Credentials, Token } from '../types/token.types.js';

export interface QueryExecutorOptions {
  workspaceId: string;
  tokenManager: TokenManager;
  baseUrl?: string;
  timeout?: number;
  http?: AxiosInstance;
  validator?: ResultValidator;
  logger?: StructuredLogger;
  metrics?: MetricsService;
}

/**
 * Query Executor
 *
 * Runs a query against a Log Analytics workspace and validates the result.
 *
 * Token handling:
 * - The token comes from the TokenManager (cache or refresh)
 * - A 403, or a body mentioning TokenExpired, forces one refresh and one retry
 * - A second rejection is surfaced, never retried again
 */
export class QueryExecutor {
  private readonly config: QueryExecutorConfig;
  private readonly tokenManager: TokenManager;
  private readonly http: AxiosInstance;
  private readonly validator: ResultValidator;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsService;

  constructor(options: QueryExecutorOptions) {
    this.config = {
      workspaceId: options.workspaceId,
      baseUrl: (options.baseUrl ?? config.logAnalyticsBaseUrl).replace(/\/$/, ''),
      timeout: options.timeout ?? config.httpTimeoutMs,
      userAgent: config.userAgent,
    };
    this.tokenManager = options.tokenManager;
    this.http = options.http ?? axios.create();
    this.validator = options.validator ?? defaultValidator;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  /**
   * Runs the query and returns the validated metric sample
   * @throws AuthError, QueryError or ValidationError
   */
  async run(query: string, credentials: Credentials, signal?: AbortSignal): Promise<MetricSample> {
    const token = await this.tokenManager.acquire(credentials, { signal });
    let result = await this.send(query, token, signal);

    if (this.isTokenRejected(result)) {
      this.logger.queryRetry({ http_status: result.status });
      this.metrics.recordQueryRetry();

      const refreshed = await this.tokenManager.acquire(credentials, { forceRefresh: true, signal });
      result = await this.send(query, refreshed, signal);
    }

    return this.toSample(result);
  }

  /**
   * Workspace query endpoint
   */
  getQueryUrl(): string {
    return `${this.config.baseUrl}/v1/workspaces/${encodeURIComponent(this.config.workspaceId)}/query`;
  }

  private isTokenRejected(result: QueryHttpResult): boolean {
    return result.status === 403 || result.body.includes(scalerConstants.query.tokenExpiredMarker);
  }

  private toSample(result: QueryHttpResult): MetricSample {
    const { body, status, transportError } = result;

    if (status !== 200 && status !== 0) {
      throw new QueryError(
        `Error processing Log Analytics request. HTTP code ${status}`,
        status,
        body,
        'http_status'
      );
    }

    if (transportError) {
      throw new QueryError(
        `Error calling Log Analytics REST api: ${transportError.message}`,
        status,
        body,
        'transport',
        transportError
      );
    }

    if (body.length === 0) {
      throw new QueryError(
        `Error processing Log Analytics request. Details: empty body. HTTP code: ${status}`,
        status,
        body,
        'empty_body'
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      throw new QueryError(
        `Error processing Log Analytics request. Details: can't decode response body to JSON. HTTP code: ${status}`,
        status,
        body,
        'decode',
        error
      );
    }

    if (!isQueryDocument(parsed)) {
      throw new QueryError(
        `Error processing Log Analytics request. Details: response body is not a query result. HTTP code: ${status}`,
        status,
        body,
        'decode'
      );
    }

    return this.validator.validate(this.validator.decode(parsed));
  }

  /**
   * Performs the HTTP request, every status is returned to the caller
   */
  private async send(query: string, token: Token, signal?: AbortSignal): Promise<QueryHttpResult> {
    const startTime = Date.now();

    try {
      const response = await this.http.post<string>(
        this.getQueryUrl(),
        { query },
        {
          headers: {
            'Content-Type': 'application/json',
            'Authorization': `Bearer ${token.accessToken}`,
            'Cache-Control': 'no-cache',
            'User-Agent': this.config.userAgent,
          },
          responseType: 'text',
          transformResponse: [(data: unknown) => data],
          validateStatus: () => true,
          timeout: this.config.timeout,
          signal,
        }
      );

      const body = typeof response.data === 'string' ? response.data : '';
      this.metrics.recordQuery(response.status, (Date.now() - startTime) / 1000);
      return { body, status: response.status };
    } catch (error) {
      const duration = Date.now() - startTime;
      this.metrics.recordQuery(0, duration / 1000);
      this.logger.queryFailed({ http_status: 0, error: getErrorMessage(error), duration });

      const transportError = error instanceof Error ? error : new Error(getErrorMessage(error));
      return { body: '', status: 0, transportError };
    }
  }
}
