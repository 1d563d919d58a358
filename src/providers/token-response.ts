import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { AuthError, getErrorMessage } from '../errors/index.js';
import type { Token, TokenResponse } from '../types/token.types.js';

/**
 * Raw identity provider response
 */
export interface RawTokenResponse {
  body: string;
  status: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readString = (payload: Record<string, unknown>, key: keyof TokenResponse): string | undefined => {
  const value = payload[key];
  if (typeof value === 'string') {
    return value;
  }
  // Some endpoints send numbers unquoted
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
};

const readEpochSeconds = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : undefined;
};

/**
 * Sends a token request and returns the raw body and status.
 * Every status is returned to the caller; only transport failures throw.
 */
export async function sendTokenRequest(
  http: AxiosInstance,
  request: AxiosRequestConfig,
  caller: string
): Promise<RawTokenResponse> {
  try {
    const response = await http.request<string>({
      ...request,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
    const body = typeof response.data === 'string' ? response.data : '';
    return { body, status: response.status };
  } catch (error) {
    if (axios.isCancel(error)) {
      throw new AuthError(`Token request to ${caller} was cancelled`, { cause: error });
    }
    throw new AuthError(`Error calling ${caller}: ${getErrorMessage(error)}`, { status: 0, cause: error });
  }
}

/**
 * Decodes an identity provider response into a Token
 * @param nowSeconds - current time, used when only expires_in is present
 */
export function parseTokenResponse(raw: RawTokenResponse, nowSeconds: number): Token {
  const { body, status } = raw;

  if (status !== 200) {
    throw new AuthError(`Error getting access token. HTTP code: ${status}`, { status, body });
  }

  if (body.length === 0) {
    throw new AuthError(`Error getting access token. Details: empty body. HTTP code: ${status}`, { status, body });
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    throw new AuthError(
      `Error getting access token. Details: can't decode response body to JSON. HTTP code: ${status}`,
      { status, body, cause: error }
    );
  }

  if (!isRecord(payload)) {
    throw new AuthError('Error getting access token. Details: response body is not a JSON object', { status, body });
  }

  const accessToken = readString(payload, 'access_token');
  if (!accessToken) {
    throw new AuthError('Error getting access token. Details: response has no access_token', { status, body });
  }

  const expiresIn = readEpochSeconds(readString(payload, 'expires_in'));
  const expiresOn =
    readEpochSeconds(readString(payload, 'expires_on')) ??
    (expiresIn !== undefined ? nowSeconds + expiresIn : undefined);
  if (expiresOn === undefined) {
    throw new AuthError('Error getting access token. Details: response has no usable expires_on', { status, body });
  }

  return {
    accessToken,
    tokenType: readString(payload, 'token_type') ?? 'Bearer',
    expiresOn,
    notBefore: readEpochSeconds(readString(payload, 'not_before')) ?? 0,
    resource: readString(payload, 'resource') ?? '',
  };
}
