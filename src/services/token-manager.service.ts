import { Mutex } from 'async-mutex';
import { setTimeout as sleepFor } from 'timers/promises';
import { scalerConstants } from '../config/config.js';
import { AuthError, getErrorMessage } from '../errors/index.js';
import { createAuthProvider, type AuthProviderFactory } from '../providers/auth-provider.factory.js';
import { fingerprintFor, type TokenStore } from './token-store.service.js';
import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';
import { metrics as defaultMetrics, type MetricsService } from './metrics.service.js';
import {
  systemClock,
  type AcquireOptions,
  type Clock,
  type Credentials,
  type Token,
  type TokenManagerConfig,
} from '../types/token.types.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

const defaultSleep: Sleep = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

export interface TokenManagerOptions {
  store: TokenStore;
  providerFactory?: AuthProviderFactory;
  config?: Partial<TokenManagerConfig>;
  clock?: Clock;
  sleep?: Sleep;
  logger?: StructuredLogger;
  metrics?: MetricsService;
}

/**
 * Token refresh statistics
 */
export interface TokenManagerStats {
  totalRefreshes: number;
  lastRefreshAt: number | null; // Unix timestamp in seconds
  lastError: string | null;
}

/**
 * Token Lifecycle Manager
 *
 * Get-or-refresh for access tokens on top of a shared TokenStore.
 *
 * - A cached token is reused while it stays valid for the expiry margin (30s)
 * - A forced refresh skips the cache: the query API already rejected the token
 * - Tokens whose validity starts in the near future are waited out,
 *   larger skews fail instead of blocking
 * - Calls for the same credentials are serialised so that concurrent
 *   scalers trigger a single identity provider call
 */
export class TokenManager {
  private readonly store: TokenStore;
  private readonly providerFactory: AuthProviderFactory;
  private readonly config: TokenManagerConfig;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsService;
  private readonly locks = new Map<string, Mutex>();
  private stats: TokenManagerStats = {
    totalRefreshes: 0,
    lastRefreshAt: null,
    lastError: null,
  };

  constructor(options: TokenManagerOptions) {
    this.store = options.store;
    this.providerFactory = options.providerFactory ?? ((credentials) => createAuthProvider(credentials));
    this.config = {
      expiryMarginSeconds: options.config?.expiryMarginSeconds ?? scalerConstants.token.expiryMarginSeconds,
      maxNotBeforeWaitSeconds:
        options.config?.maxNotBeforeWaitSeconds ?? scalerConstants.token.maxNotBeforeWaitSeconds,
    };
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  /**
   * Gets a usable token for the credentials, refreshing when necessary
   * @throws AuthError when the identity provider fails or the token is not valid yet
   */
  async acquire(credentials: Credentials, options: AcquireOptions = {}): Promise<Token> {
    const fingerprint = fingerprintFor(credentials);

    return this.lockFor(fingerprint).runExclusive(async () => {
      if (!options.forceRefresh) {
        const cached = this.store.get(fingerprint);
        if (cached && this.isFresh(cached)) {
          return cached;
        }
      }

      const token = await this.refresh(credentials, options.signal);
      this.store.put(fingerprint, token);
      return token;
    });
  }

  /**
   * Whether a token stays valid for at least the expiry margin
   */
  isFresh(token: Token): boolean {
    return this.clock() + this.config.expiryMarginSeconds <= token.expiresOn;
  }

  getStats(): TokenManagerStats {
    return { ...this.stats };
  }

  private async refresh(credentials: Credentials, signal?: AbortSignal): Promise<Token> {
    const provider = this.providerFactory(credentials);

    try {
      const token = await provider.fetchToken(signal);
      await this.waitUntilValid(token, credentials, signal);

      this.stats.totalRefreshes++;
      this.stats.lastRefreshAt = this.clock();
      this.stats.lastError = null;
      this.metrics.recordTokenRefresh(provider.mode, true);
      this.logger.tokenRefreshed({
        authMode: provider.mode,
        clientId: credentials.kind === 'servicePrincipal' ? credentials.clientId : undefined,
        expiresOn: token.expiresOn,
        token: token.accessToken,
      });

      return token;
    } catch (error) {
      const message = getErrorMessage(error);
      this.stats.lastError = message;
      this.metrics.recordTokenRefresh(provider.mode, false);
      this.logger.tokenRefreshFailed({
        authMode: provider.mode,
        http_status: error instanceof AuthError ? error.status : undefined,
        error: message,
      });
      throw error;
    }
  }

  /**
   * Blocks until the token's not-before time has passed
   */
  private async waitUntilValid(token: Token, credentials: Credentials, signal?: AbortSignal): Promise<void> {
    const now = this.clock();
    if (token.notBefore <= now) {
      return;
    }

    const skewSeconds = token.notBefore - now;
    if (skewSeconds > this.config.maxNotBeforeWaitSeconds) {
      throw new AuthError(
        `Error getting access token. Details: token not yet valid, skew too large (starts in ${skewSeconds} seconds)`
      );
    }

    const delaySeconds = skewSeconds + 1;
    this.logger.tokenNotReady({ authMode: credentials.kind, delaySeconds });

    try {
      await this.sleep(delaySeconds * 1000, signal);
    } catch (error) {
      throw new AuthError('Waiting for the token to become valid was cancelled', { cause: error });
    }
  }

  private lockFor(fingerprint: string): Mutex {
    let lock = this.locks.get(fingerprint);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(fingerprint, lock);
    }
    return lock;
  }
}
