/**
 * Token management types
 */

/**
 * Token response from the identity provider
 * Numeric fields are transmitted as strings
 */
export interface TokenResponse {
  token_type?: string;
  expires_in?: string;
  ext_expires_in?: string;
  expires_on?: string;
  not_before?: string;
  resource?: string;
  access_token?: string;
}

/**
 * Access token as cached and handed to callers
 */
export interface Token {
  accessToken: string;
  tokenType: string;
  expiresOn: number; // Unix timestamp in seconds
  notBefore: number; // Unix timestamp in seconds
  resource: string;
}

export interface ServicePrincipalCredentials {
  kind: 'servicePrincipal';
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

export interface ManagedIdentityCredentials {
  kind: 'managedIdentity';
  identityTag: string;
}

/**
 * Credentials a token is fetched and cached for
 */
export type Credentials = ServicePrincipalCredentials | ManagedIdentityCredentials;

export type AuthMode = Credentials['kind'];

/**
 * Options for a single acquire call
 */
export interface AcquireOptions {
  /** Skip the cache freshness check (server reported the token invalid) */
  forceRefresh?: boolean;
  signal?: AbortSignal;
}

/**
 * Token manager configuration
 */
export interface TokenManagerConfig {
  expiryMarginSeconds: number;
  maxNotBeforeWaitSeconds: number;
}

/**
 * Returns the current time as a Unix timestamp in seconds
 */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
