import type { AuthMode, Token } from '../types/token.types.js';

/**
 * Auth Provider Interface
 *
 * Fetches a fresh access token from the identity provider.
 * Implementations: ServicePrincipalProvider (client credentials grant)
 * and ManagedIdentityProvider (instance metadata endpoint).
 */
export interface IAuthProvider {
  readonly mode: AuthMode;

  /**
   * Requests a new token, never consults a cache
   * @throws AuthError when the identity provider call fails or the body is unusable
   */
  fetchToken(signal?: AbortSignal): Promise<Token>;
}

/**
 * HTTP settings shared by the providers
 */
export interface AuthProviderHttpConfig {
  timeout: number;
  userAgent: string;
}
