import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../src/app.js';
import { TokenStore } from '../../src/services/token-store.service.js';
import { createStubHttp, json, queryBody, tokenBody, type StubRequest, type StubResponse } from '../helpers/http-stub.js';

/**
 * Scaler API - requests served in process, identity provider and
 * query API answered by the stubbed HTTP client
 */

const scaledObject = {
  name: 'orders',
  namespace: 'shop',
  scalerMetadata: {
    tenantId: 'tenant-1',
    clientId: 'client-1',
    clientSecret: 'test-secret',
    workspaceId: 'ws-1',
    query: 'Perf | summarize count()',
    threshold: '10',
  },
};

const nowSeconds = () => Math.floor(Date.now() / 1000);

describe('Scaler API', () => {
  let server: FastifyInstance;
  let store: TokenStore;
  let tokenReply: () => StubResponse;
  let queryReply: () => StubResponse;
  let requests: StubRequest[];

  beforeEach(async () => {
    store = new TokenStore();
    tokenReply = () => tokenBody('sp-token', nowSeconds() + 3600);
    queryReply = () => queryBody(['real', 'real'], [12.0, 100.0]);

    const stub = createStubHttp((request) =>
      request.url.includes('/oauth2/token') ? tokenReply() : queryReply()
    );
    requests = stub.requests;
    server = await buildServer({ tokenStore: store, http: stub.http, resolvedEnv: {}, logger: false });
  });

  afterEach(async () => {
    await server.close();
  });

  describe('POST /scaler/is-active', () => {
    it('should report an active workload', async () => {
      const response = await server.inject({ method: 'POST', url: '/scaler/is-active', payload: scaledObject });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ result: true });
      expect(requests.map((request) => request.url)).toEqual([
        'https://login.microsoftonline.com/tenant-1/oauth2/token',
        'https://api.loganalytics.io/v1/workspaces/ws-1/query',
      ]);
      expect(store.size).toBe(1);
    });

    it('should reuse the stored token across requests', async () => {
      await server.inject({ method: 'POST', url: '/scaler/is-active', payload: scaledObject });
      await server.inject({ method: 'POST', url: '/scaler/is-active', payload: scaledObject });

      const tokenCalls = requests.filter((request) => request.url.includes('/oauth2/token'));
      expect(tokenCalls).toHaveLength(1);
      expect(requests).toHaveLength(3);
    });

    it('should answer 400 for incomplete metadata', async () => {
      const { query: _query, ...metadata } = scaledObject.scalerMetadata;
      const response = await server.inject({
        method: 'POST',
        url: '/scaler/is-active',
        payload: { ...scaledObject, scalerMetadata: metadata },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: 'ConfigError',
        message:
          'Failed to initialize Log Analytics scaler. Scaled object: orders. Namespace: shop. Error parsing metadata. Details: query was not found in metadata. Check your ScaledObject configuration',
      });
      expect(requests).toHaveLength(0);
    });

    it('should answer 400 when the body does not match the schema', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/scaler/is-active',
        payload: { namespace: 'shop', scalerMetadata: {} },
      });

      expect(response.statusCode).toBe(400);
    });

    it('should answer 502 when the identity provider rejects the credentials', async () => {
      tokenReply = () => json({ error: 'invalid_client' }, 401);

      const response = await server.inject({ method: 'POST', url: '/scaler/is-active', payload: scaledObject });

      expect(response.statusCode).toBe(502);
      expect(response.json()).toEqual({
        error: 'AuthError',
        message: 'Error getting access token. HTTP code: 401',
      });
    });

    it('should answer 422 when the query result has the wrong shape', async () => {
      queryReply = () => json({ tables: [] });

      const response = await server.inject({ method: 'POST', url: '/scaler/is-active', payload: scaledObject });

      expect(response.statusCode).toBe(422);
      expect(response.json().error).toBe('ValidationError');
    });
  });

  describe('POST /scaler/metric-spec', () => {
    it('should return the metric name and the threshold from the query', async () => {
      const response = await server.inject({ method: 'POST', url: '/scaler/metric-spec', payload: scaledObject });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        metricSpecs: [{ metricName: 'azure-log-analytics-ws-1', targetSize: 100 }],
      });
    });

    it('should fall back to the configured threshold', async () => {
      queryReply = () => queryBody(['long'], [3]);

      const response = await server.inject({ method: 'POST', url: '/scaler/metric-spec', payload: scaledObject });

      expect(response.json()).toEqual({
        metricSpecs: [{ metricName: 'azure-log-analytics-ws-1', targetSize: 10 }],
      });
    });

    it('should return no specs when the query fails', async () => {
      queryReply = () => ({ status: 500, body: 'boom' });

      const response = await server.inject({ method: 'POST', url: '/scaler/metric-spec', payload: scaledObject });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ metricSpecs: [] });
    });
  });

  describe('POST /scaler/metrics', () => {
    it('should return the current metric value', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/scaler/metrics',
        payload: { scaledObjectRef: scaledObject, metricName: 'azure-log-analytics-ws-1' },
      });

      expect(response.statusCode).toBe(200);
      const [value] = response.json().metricValues;
      expect(value.metricName).toBe('azure-log-analytics-ws-1');
      expect(value.metricValue).toBe(12);
      expect(typeof value.timestamp).toBe('string');
    });

    it('should answer 502 when the query API fails', async () => {
      queryReply = () => ({ status: 500, body: 'boom' });

      const response = await server.inject({
        method: 'POST',
        url: '/scaler/metrics',
        payload: { scaledObjectRef: scaledObject, metricName: 'azure-log-analytics-ws-1' },
      });

      expect(response.statusCode).toBe(502);
      expect(response.json()).toEqual({
        error: 'QueryError',
        message: 'Error processing Log Analytics request. HTTP code 500',
      });
    });
  });

  describe('GET /health', () => {
    it('should report token store entries', async () => {
      await server.inject({ method: 'POST', url: '/scaler/is-active', payload: scaledObject });

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.status).toBe('ok');
      expect(body.tokenStore).toEqual({ entries: 1 });
      expect(body.tokenManager.totalRefreshes).toBe(1);
    });
  });

  describe('GET /metrics', () => {
    it('should expose the scaler metrics', async () => {
      const response = await server.inject({ method: 'GET', url: '/metrics' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toContain('text/plain');
      expect(response.body).toContain('# TYPE scaler_query_requests_total counter');
    });
  });
});
