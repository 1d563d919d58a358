import axios, { type AxiosInstance } from 'axios';
import { config } from '../config/env.js';
import { scalerConstants } from '../config/config.js';
import type { IAuthProvider, AuthProviderHttpConfig } from './auth.provider.interface.js';
import { parseTokenResponse, sendTokenRequest } from './token-response.js';
import { systemClock, type Clock, type Token } from '../types/token.types.js';

export interface ManagedIdentityProviderOptions {
  endpoint?: string;
  http?: AxiosInstance;
  httpConfig?: Partial<AuthProviderHttpConfig>;
  clock?: Clock;
}

/**
 * Managed Identity Provider
 *
 * Unauthenticated GET against the instance metadata service (IMDS).
 * No secret is stored: the platform vouches for the workload.
 */
export class ManagedIdentityProvider implements IAuthProvider {
  readonly mode = 'managedIdentity' as const;

  private readonly endpoint: string;
  private readonly http: AxiosInstance;
  private readonly httpConfig: AuthProviderHttpConfig;
  private readonly clock: Clock;

  constructor(options: ManagedIdentityProviderOptions = {}) {
    this.endpoint = options.endpoint ?? config.managedIdentityEndpoint;
    this.http = options.http ?? axios.create();
    this.httpConfig = {
      timeout: options.httpConfig?.timeout ?? config.httpTimeoutMs,
      userAgent: options.httpConfig?.userAgent ?? config.userAgent,
    };
    this.clock = options.clock ?? systemClock;
  }

  async fetchToken(signal?: AbortSignal): Promise<Token> {
    const raw = await sendTokenRequest(
      this.http,
      {
        method: 'GET',
        url: this.buildTokenUrl(),
        headers: {
          Metadata: 'true',
          'Cache-Control': 'no-cache',
          'User-Agent': this.httpConfig.userAgent,
        },
        timeout: this.httpConfig.timeout,
        signal,
      },
      'IMDS'
    );

    return parseTokenResponse(raw, this.clock());
  }

  private buildTokenUrl(): string {
    const url = new URL(this.endpoint);
    url.searchParams.set('api-version', scalerConstants.managedIdentityApiVersion);
    url.searchParams.set('resource', scalerConstants.resource);
    return url.toString();
  }
}
