import { scalerConstants } from './config.js';
import { ConfigError } from '../errors/index.js';
import type { ScalerMetadata, ScalerMetadataInput } from '../types/scaler.types.js';
import type { Credentials } from '../types/token.types.js';

/**
 * Scaler metadata parsing
 *
 * Each field is looked up, in order, in:
 * 1. authParams[field] (credential and workspace fields only)
 * 2. metadata[field]
 * 3. resolvedEnv[metadata[`${field}FromEnv`]]
 */

interface FieldSources {
  metadata: Record<string, string>;
  authParams: Record<string, string>;
  resolvedEnv: Record<string, string | undefined>;
}

const nonEmpty = (value: string | undefined): value is string => value !== undefined && value !== '';

function resolveField(field: string, sources: FieldSources, fromAuthParams: boolean): string {
  if (fromAuthParams && nonEmpty(sources.authParams[field])) {
    return sources.authParams[field];
  }
  if (nonEmpty(sources.metadata[field])) {
    return sources.metadata[field];
  }

  const envName = sources.metadata[`${field}FromEnv`];
  if (nonEmpty(envName)) {
    const value = sources.resolvedEnv[envName];
    if (nonEmpty(value)) {
      return value;
    }
    throw new ConfigError(
      `Error parsing metadata. Details: ${field}FromEnv points to ${envName}, which is empty or not set`
    );
  }

  throw new ConfigError(
    `Error parsing metadata. Details: ${field} was not found in metadata. Check your ScaledObject configuration`
  );
}

function parseThreshold(value: string): number {
  const parsed = Number(value);
  if (!/^[+-]?\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
    throw new ConfigError(`Error parsing metadata. Details: can't parse threshold "${value}"`);
  }
  return parsed;
}

function resolveCredentials(podIdentity: string, sources: FieldSources): Credentials {
  if (podIdentity === '' || podIdentity === 'none') {
    return {
      kind: 'servicePrincipal',
      tenantId: resolveField('tenantId', sources, true),
      clientId: resolveField('clientId', sources, true),
      clientSecret: resolveField('clientSecret', sources, true),
    };
  }
  if (podIdentity === scalerConstants.managedIdentityTag) {
    return { kind: 'managedIdentity', identityTag: scalerConstants.managedIdentityTag };
  }
  throw new ConfigError(`Error parsing metadata. Details: Log Analytics Scaler doesn't support pod identity ${podIdentity}`);
}

/**
 * Validates raw scaler configuration
 * @throws ConfigError naming the first missing or invalid field
 */
export function parseScalerMetadata(input: ScalerMetadataInput): ScalerMetadata {
  const sources: FieldSources = {
    metadata: input.metadata,
    authParams: input.authParams ?? {},
    resolvedEnv: input.resolvedEnv ?? {},
  };

  const credentials = resolveCredentials(input.podIdentity ?? '', sources);

  return {
    credentials,
    workspaceId: resolveField('workspaceId', sources, true),
    query: resolveField('query', sources, false),
    threshold: parseThreshold(resolveField('threshold', sources, false)),
  };
}
