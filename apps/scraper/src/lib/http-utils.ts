import type { RequestInit, Response } from 'undici';

// The subset of undici's fetch the clients depend on, so tests can substitute an in-process fake
export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export const createUserAgent = (component: string): Record<string, string> => ({
  'User-Agent': `aare-scraper/${component}`,
});

const TRANSPORT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const errorCodeOf = (value: unknown): string | undefined =>
  typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string'
    ? value.code
    : undefined;

/**
 * True for failures below HTTP: refused or reset connections, DNS lookups, timeouts.
 */
export const isTransportError = (error: unknown): boolean => {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return true;
  }

  const code = errorCodeOf(error) ?? errorCodeOf(error.cause);
  return code !== undefined && TRANSPORT_ERROR_CODES.has(code);
};
