/**
 * Scaler constants
 * Fixed values of the Log Analytics token and query protocol
 */

export const scalerConstants = {
  // Resource every token is requested for
  resource: 'https://api.loganalytics.io/',

  // Managed identity (IMDS) API version
  managedIdentityApiVersion: '2018-02-01',

  // Sentinel used as both fingerprint inputs for managed identity tokens
  managedIdentityTag: 'azure',

  token: {
    // Refresh tokens that expire within this window
    expiryMarginSeconds: 30,
    // Longest not-before skew we are willing to wait out
    maxNotBeforeWaitSeconds: 10,
  },

  query: {
    // Marker the query API puts in the body when the bearer token has expired
    tokenExpiredMarker: 'TokenExpired',
    // Value column and threshold column must have one of these declared types
    numericColumnTypes: ['real', 'int', 'long'],
  },

  // Prefix of the external metric name
  metricNamePrefix: 'azure-log-analytics',

  // Response bodies attached to errors are cut to this length
  maxErrorBodyLength: 500,
} as const;
