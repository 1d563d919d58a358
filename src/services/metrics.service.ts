/**
 * Prometheus Metrics Service
 *
 * Exposes the scaler's own metrics for monitoring and alerting.
 *
 * Metrics:
 * - scaler_token_refreshes_total{mode,status}: Token refreshes by auth mode
 * - scaler_query_requests_total{status_code}: Log Analytics requests by status code
 * - scaler_query_retries_total: Queries retried after the token was rejected
 * - scaler_query_duration_seconds: Query round trip histogram
 * - scaler_http_requests_total{method,route,status_code}: Requests served by the scaler API
 */

import { Registry, Counter, Histogram } from 'prom-client';

export class MetricsService {
  private registry: Registry;

  // Counters
  public tokenRefreshesTotal: Counter<'mode' | 'status'>;
  public queryRequestsTotal: Counter<'status_code'>;
  public queryRetriesTotal: Counter;
  public httpRequestsTotal: Counter<'method' | 'route' | 'status_code'>;

  // Histograms
  public queryDuration: Histogram<'status_code'>;
  public httpDuration: Histogram<'method' | 'route' | 'status_code'>;

  constructor() {
    this.registry = new Registry();

    this.registry.setDefaultLabels({
      app: 'log-analytics-scaler',
    });

    this.tokenRefreshesTotal = new Counter({
      name: 'scaler_token_refreshes_total',
      help: 'Total number of access token refreshes by auth mode',
      labelNames: ['mode', 'status'] as const,
      registers: [this.registry],
    });

    this.queryRequestsTotal = new Counter({
      name: 'scaler_query_requests_total',
      help: 'Total number of Log Analytics query requests by status code',
      labelNames: ['status_code'] as const,
      registers: [this.registry],
    });

    this.queryRetriesTotal = new Counter({
      name: 'scaler_query_retries_total',
      help: 'Total number of queries retried after the token was rejected',
      registers: [this.registry],
    });

    this.httpRequestsTotal = new Counter({
      name: 'scaler_http_requests_total',
      help: 'Total number of requests served by the scaler API',
      labelNames: ['method', 'route', 'status_code'] as const,
      registers: [this.registry],
    });

    this.queryDuration = new Histogram({
      name: 'scaler_query_duration_seconds',
      help: 'Log Analytics query duration in seconds',
      labelNames: ['status_code'] as const,
      buckets: [0.1, 0.5, 1, 2, 5, 10, 30], // seconds
      registers: [this.registry],
    });

    this.httpDuration = new Histogram({
      name: 'scaler_http_duration_seconds',
      help: 'Scaler API request duration in seconds',
      labelNames: ['method', 'route', 'status_code'] as const,
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10], // seconds
      registers: [this.registry],
    });
  }

  recordTokenRefresh(mode: string, success: boolean) {
    this.tokenRefreshesTotal.inc({ mode, status: success ? 'SUCCESS' : 'FAILED' });
  }

  recordQuery(statusCode: number, durationSeconds: number) {
    const status_code = statusCode.toString();
    this.queryRequestsTotal.inc({ status_code });
    this.queryDuration.observe({ status_code }, durationSeconds);
  }

  recordQueryRetry() {
    this.queryRetriesTotal.inc();
  }

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number) {
    const labels = { method, route, status_code: statusCode.toString() };
    this.httpRequestsTotal.inc(labels);
    this.httpDuration.observe(labels, durationSeconds);
  }

  /**
   * Gets metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  /**
   * Resets all metrics (for testing)
   */
  reset() {
    this.registry.resetMetrics();
  }
}

/**
 * Global metrics instance
 */
export const metrics = new MetricsService();
