import type { AxiosInstance } from 'axios';
import type { IAuthProvider } from './auth.provider.interface.js';
import { ServicePrincipalProvider } from './service-principal.provider.js';
import { ManagedIdentityProvider } from './managed-identity.provider.js';
import type { Clock, Credentials } from '../types/token.types.js';

export interface AuthProviderFactoryOptions {
  http?: AxiosInstance;
  clock?: Clock;
}

export type AuthProviderFactory = (credentials: Credentials) => IAuthProvider;

/**
 * Selects the token flow for the credentials.
 * The flow is fixed for the lifetime of the credentials.
 */
export function createAuthProvider(credentials: Credentials, options: AuthProviderFactoryOptions = {}): IAuthProvider {
  switch (credentials.kind) {
    case 'servicePrincipal':
      return new ServicePrincipalProvider({ credentials, http: options.http, clock: options.clock });
    case 'managedIdentity':
      return new ManagedIdentityProvider({ http: options.http, clock: options.clock });
    default: {
      const unknownKind: never = credentials;
      throw new Error(`Unsupported auth mode: ${JSON.stringify(unknownKind)}`);
    }
  }
}
