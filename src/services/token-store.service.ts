import crypto from 'crypto';
import type { Credentials, Token } from '../types/token.types.js';

/**
 * Token Store
 *
 * Process-wide cache of access tokens keyed by credential fingerprint,
 * shared by every scaler instance that is handed the same store.
 *
 * - Map reads and writes run synchronously on the event loop, so a reader
 *   never interleaves with a writer and no I/O happens while touching the map
 * - Tokens are frozen before they are stored and replaced wholesale on refresh
 * - Entries are overwritten, never evicted: the store grows with the number
 *   of distinct credential sets seen by the process
 */
export class TokenStore {
  private readonly tokens = new Map<string, Readonly<Token>>();

  /**
   * Returns the cached token, or undefined when none is usable
   */
  get(fingerprint: string): Readonly<Token> | undefined {
    const token = this.tokens.get(fingerprint);
    if (!token || token.accessToken === '') {
      return undefined;
    }
    return token;
  }

  put(fingerprint: string, token: Token): void {
    this.tokens.set(fingerprint, Object.freeze({ ...token }));
  }

  /**
   * Number of cached entries
   */
  get size(): number {
    return this.tokens.size;
  }
}

/**
 * Computes the cache key for a credential pair
 * Format: base64(sha256(JSON.stringify([first, second])))
 */
export function computeFingerprint(first: string, second: string): string {
  return crypto.createHash('sha256').update(JSON.stringify([first, second])).digest('base64');
}

/**
 * Fingerprint of the credentials a token belongs to.
 * Managed identity uses its tag as both inputs, so every managed identity
 * scaler in the process shares one token.
 */
export function fingerprintFor(credentials: Credentials): string {
  switch (credentials.kind) {
    case 'servicePrincipal':
      return computeFingerprint(credentials.clientId, credentials.clientSecret);
    case 'managedIdentity':
      return computeFingerprint(credentials.identityTag, credentials.identityTag);
  }
}

/**
 * Default store shared by the scaler API
 */
export const tokenStore = new TokenStore();
