import axios, { type AxiosInstance } from 'axios';
import { config } from '../config/env.js';
import { scalerConstants } from '../config/config.js';
import type { IAuthProvider, AuthProviderHttpConfig } from './auth.provider.interface.js';
import { parseTokenResponse, sendTokenRequest } from './token-response.js';
import { systemClock, type Clock, type ServicePrincipalCredentials, type Token } from '../types/token.types.js';

export interface ServicePrincipalProviderOptions {
  credentials: ServicePrincipalCredentials;
  authorityHost?: string;
  http?: AxiosInstance;
  httpConfig?: Partial<AuthProviderHttpConfig>;
  clock?: Clock;
}

/**
 * Service Principal Provider
 *
 * Client credentials grant against the tenant's Azure AD token endpoint.
 */
export class ServicePrincipalProvider implements IAuthProvider {
  readonly mode = 'servicePrincipal' as const;

  private readonly credentials: ServicePrincipalCredentials;
  private readonly authorityHost: string;
  private readonly http: AxiosInstance;
  private readonly httpConfig: AuthProviderHttpConfig;
  private readonly clock: Clock;

  constructor(options: ServicePrincipalProviderOptions) {
    this.credentials = options.credentials;
    this.authorityHost = (options.authorityHost ?? config.authorityHost).replace(/\/$/, '');
    this.http = options.http ?? axios.create();
    this.httpConfig = {
      timeout: options.httpConfig?.timeout ?? config.httpTimeoutMs,
      userAgent: options.httpConfig?.userAgent ?? config.userAgent,
    };
    this.clock = options.clock ?? systemClock;
  }

  async fetchToken(signal?: AbortSignal): Promise<Token> {
    const body = this.buildTokenBody().toString();

    const raw = await sendTokenRequest(
      this.http,
      {
        method: 'POST',
        url: this.buildTokenUrl(),
        data: body,
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'Cache-Control': 'no-cache',
          'User-Agent': this.httpConfig.userAgent,
        },
        timeout: this.httpConfig.timeout,
        signal,
      },
      'Azure Active Directory'
    );

    return parseTokenResponse(raw, this.clock());
  }

  private buildTokenUrl(): string {
    return `${this.authorityHost}/${encodeURIComponent(this.credentials.tenantId)}/oauth2/token`;
  }

  private buildTokenBody(): URLSearchParams {
    const body = new URLSearchParams();
    body.set('grant_type', 'client_credentials');
    body.set('client_id', this.credentials.clientId);
    body.set('redirect_uri', 'http://');
    body.set('resource', scalerConstants.resource);
    body.set('client_secret', this.credentials.clientSecret);
    return body;
  }
}
