import { describe, it, expect, vi, beforeEach } from 'vitest';
import { QueryExecutor } from '../../src/services/query-executor.service.js';
import { TokenManager } from '../../src/services/token-manager.service.js';
import { TokenStore, fingerprintFor } from '../../src/services/token-store.service.js';
import { AuthError, QueryError, ValidationError } from '../../src/errors/index.js';
import { metrics } from '../../src/services/metrics.service.js';
import type { IAuthProvider } from '../../src/providers/auth.provider.interface.js';
import type { Credentials, Token } from '../../src/types/token.types.js';
import { createStubHttp, hangUntilAborted, json, makeToken, queryBody, type StubHandler } from '../helpers/http-stub.js';

const NOW = 1_700_000_000;
const QUERY_URL = 'https://api.loganalytics.io/v1/workspaces/ws-1/query';

const credentials: Credentials = {
  kind: 'servicePrincipal',
  tenantId: 'tenant',
  clientId: 'client',
  clientSecret: 'test-secret',
};

const catchQueryError = async (promise: Promise<unknown>): Promise<QueryError> => {
  try {
    await promise;
  } catch (error) {
    if (error instanceof QueryError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a QueryError');
};

describe('QueryExecutor', () => {
  let store: TokenStore;
  let issued: number;
  let fetchToken: ReturnType<typeof vi.fn>;
  let tokenManager: TokenManager;

  beforeEach(() => {
    store = new TokenStore();
    issued = 0;
    fetchToken = vi.fn(async (): Promise<Token> => {
      issued++;
      return makeToken(`token-${issued}`, NOW + 3600);
    });
    const provider: IAuthProvider = {
      mode: 'servicePrincipal',
      fetchToken: async (signal?: AbortSignal) => fetchToken(signal),
    };
    tokenManager = new TokenManager({ store, providerFactory: () => provider, clock: () => NOW });
  });

  const createExecutor = (handler: StubHandler) => {
    const stub = createStubHttp(handler);
    const executor = new QueryExecutor({ workspaceId: 'ws-1', tokenManager, http: stub.http });
    return { executor, requests: stub.requests };
  };

  it('posts the query with the bearer token and returns the sample', async () => {
    const { executor, requests } = createExecutor(() => queryBody(['real', 'real'], [12.0, 100.0]));

    const sample = await executor.run('Perf | summarize', credentials);

    expect(sample).toEqual({ value: 12, threshold: 100 });
    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe('POST');
    expect(requests[0].url).toBe(QUERY_URL);
    expect(requests[0].headers.authorization).toBe('Bearer token-1');
    expect(JSON.parse(requests[0].data)).toEqual({ query: 'Perf | summarize' });
  });

  it('reuses a cached token', async () => {
    store.put(fingerprintFor(credentials), makeToken('cached', NOW + 3600));
    const { executor, requests } = createExecutor(() => queryBody(['int'], [3]));

    await executor.run('q', credentials);

    expect(fetchToken).not.toHaveBeenCalled();
    expect(requests[0].headers.authorization).toBe('Bearer cached');
  });

  it('refreshes the token and retries once after a 403', async () => {
    const statuses = [403, 200];
    const { executor, requests } = createExecutor(() => {
      const status = statuses.shift() ?? 200;
      return status === 403 ? json({ error: 'forbidden' }, 403) : queryBody(['int'], [4]);
    });

    const sample = await executor.run('q', credentials);

    expect(sample).toEqual({ value: 4, threshold: -1 });
    expect(fetchToken).toHaveBeenCalledTimes(2);
    expect(requests.map((request) => request.headers.authorization)).toEqual(['Bearer token-1', 'Bearer token-2']);
    expect(store.get(fingerprintFor(credentials))?.accessToken).toBe('token-2');
    expect(await metrics.getMetrics()).toContain('scaler_query_retries_total{app="log-analytics-scaler"} 1');
  });

  it('retries when the body reports an expired token', async () => {
    let calls = 0;
    const { executor, requests } = createExecutor(() => {
      calls++;
      return calls === 1 ? json({ error: { code: 'TokenExpired' } }, 200) : queryBody(['int'], [1]);
    });

    await expect(executor.run('q', credentials)).resolves.toEqual({ value: 1, threshold: -1 });
    expect(requests).toHaveLength(2);
    expect(fetchToken).toHaveBeenCalledTimes(2);
  });

  it('retries only once when the query API keeps rejecting the token', async () => {
    const { executor, requests } = createExecutor(() => json({ error: 'forbidden' }, 403));

    const error = await catchQueryError(executor.run('q', credentials));

    expect(error.status).toBe(403);
    expect(error.reason).toBe('http_status');
    expect(error.message).toBe('Error processing Log Analytics request. HTTP code 403');
    expect(requests).toHaveLength(2);
    expect(fetchToken).toHaveBeenCalledTimes(2);
  });

  it('surfaces a failed forced refresh without querying again', async () => {
    fetchToken
      .mockResolvedValueOnce(makeToken('token-1', NOW + 3600))
      .mockRejectedValueOnce(new AuthError('Error getting access token. HTTP code: 401', { status: 401 }));
    const { executor, requests } = createExecutor(() => json({ error: 'forbidden' }, 403));

    await expect(executor.run('q', credentials)).rejects.toThrow(AuthError);
    expect(requests).toHaveLength(1);
    expect(fetchToken).toHaveBeenCalledTimes(2);
  });

  it('reports an aborted query as a transport failure', async () => {
    const controller = new AbortController();
    const { executor, requests } = createExecutor((request) => {
      const pending = hangUntilAborted(request);
      controller.abort();
      return pending;
    });

    const error = await catchQueryError(executor.run('q', credentials, controller.signal));

    expect(error.reason).toBe('transport');
    expect(error.status).toBe(0);
    expect(requests).toHaveLength(1);
  });

  it('does not retry other failing statuses', async () => {
    const { executor, requests } = createExecutor(() => ({ status: 500, body: 'boom' }));

    const error = await catchQueryError(executor.run('q', credentials));

    expect(error.status).toBe(500);
    expect(error.body).toBe('boom');
    expect(requests).toHaveLength(1);
    expect(fetchToken).toHaveBeenCalledTimes(1);
  });

  it('reports a transport failure', async () => {
    const { executor } = createExecutor(() => {
      throw new Error('socket hang up');
    });

    const error = await catchQueryError(executor.run('q', credentials));

    expect(error.reason).toBe('transport');
    expect(error.status).toBe(0);
    expect(error.message).toBe('Error calling Log Analytics REST api: socket hang up');
  });

  it('reports an empty body', async () => {
    const { executor } = createExecutor(() => ({ status: 200, body: '' }));

    const error = await catchQueryError(executor.run('q', credentials));

    expect(error.reason).toBe('empty_body');
  });

  it('reports a body that is not JSON', async () => {
    const { executor } = createExecutor(() => ({ status: 200, body: 'not json' }));

    const error = await catchQueryError(executor.run('q', credentials));

    expect(error.reason).toBe('decode');
    expect(error.body).toBe('not json');
  });

  it('reports JSON that is not a query result as a decode failure', async () => {
    for (const payload of [[], { tables: 'x' }, { tables: ['x'] }]) {
      const { executor } = createExecutor(() => json(payload));

      const error = await catchQueryError(executor.run('q', credentials));

      expect(error.reason).toBe('decode');
      expect(error.message).toBe(
        'Error processing Log Analytics request. Details: response body is not a query result. HTTP code: 200'
      );
    }
  });

  it('treats a document without tables as an empty result', async () => {
    const { executor } = createExecutor(() => json({}));

    await expect(executor.run('q', credentials)).rejects.toMatchObject({ code: 'NO_TABLES' });
  });

  it('propagates validation errors', async () => {
    const { executor } = createExecutor(() => json({ tables: [] }));

    await expect(executor.run('q', credentials)).rejects.toBeInstanceOf(ValidationError);
  });

  it('builds the query URL from a custom base URL', () => {
    const executor = new QueryExecutor({
      workspaceId: 'ws/1',
      tokenManager,
      baseUrl: 'https://query.example.test/',
    });

    expect(executor.getQueryUrl()).toBe('https://query.example.test/v1/workspaces/ws%2F1/query');
  });
});
