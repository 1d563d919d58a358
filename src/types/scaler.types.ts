import type { Credentials } from './token.types.js';

/**
 * Scaler types
 */

/**
 * Validated scaler metadata
 */
export interface ScalerMetadata {
  credentials: Credentials;
  workspaceId: string;
  query: string;
  threshold: number;
}

/**
 * Raw scaler configuration, as handed over by the scheduler
 */
export interface ScalerMetadataInput {
  metadata: Record<string, string>;
  authParams?: Record<string, string>;
  resolvedEnv?: Record<string, string | undefined>;
  podIdentity?: string;
}

/**
 * Per-instance cache of the last fetched metric
 * -1 means not yet fetched in this cycle
 */
export interface SessionCache {
  metricValue: number;
  metricThreshold: number;
}

/**
 * External metric target registered with the autoscaler
 */
export interface ExternalMetricSpec {
  metricName: string;
  targetType: 'AverageValue';
  targetAverageValue: number;
}

export interface ExternalMetricValue {
  metricName: string;
  value: number;
  timestamp: string;
}

/**
 * Reference to the scaled object a request is about
 */
export interface ScaledObjectRef {
  name: string;
  namespace: string;
  scalerMetadata: Record<string, string>;
  authParams?: Record<string, string>;
  podIdentity?: string;
}
