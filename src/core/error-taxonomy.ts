/**
 * Error Taxonomy
 *
 * Maps every transport or library failure onto exactly one ErrorKind and
 * decides whether that kind is worth another attempt.
 *
 * Retryable: Timeout, ConnectionFailure, ClientProtocolFailure, SSLFailure.
 * Final: HTTPStatusFailure (the server answered) and ParseFailure (the bytes
 * are already here; parsing them again gives the same answer).
 */

import type { ErrorKind, ErrorKindType } from '../types/fetch.js';

// ============================================
// ERROR CLASSES
// ============================================

/**
 * Raised by the transport when an attempt exceeds its time budget
 */
export class TransportTimeoutError extends Error {
  readonly code = 'ETIMEDOUT';

  constructor(public readonly timeoutMs: number, url: string) {
    super(`Request timeout after ${timeoutMs / 1000}s: ${url}`);
    this.name = 'TransportTimeoutError';
  }
}

/**
 * The proxy refused or failed the CONNECT tunnel
 */
export class ProxyTunnelError extends Error {
  constructor(public readonly proxy: string, public readonly statusCode: number | undefined, detail: string) {
    super(`Proxy tunnel via ${proxy} failed: ${detail}`);
    this.name = 'ProxyTunnelError';
  }
}

export class TooManyRedirectsError extends Error {
  constructor(public readonly url: string, public readonly limit: number) {
    super(`Too many redirects (>${limit}) starting at ${url}`);
    this.name = 'TooManyRedirectsError';
  }
}

/**
 * The caller aborted the operation. Never retried and never converted
 * into a failure result; it propagates to the caller.
 */
export class FetchCancelledError extends Error {
  constructor(public readonly url: string, reason?: unknown) {
    super(`Fetch cancelled: ${url}${reason instanceof Error ? ` (${reason.message})` : ''}`);
    this.name = 'FetchCancelledError';
  }
}

// ============================================
// CLASSIFICATION
// ============================================

export interface ClassifiedError {
  kind: ErrorKind;
  message: string;
}

const RETRYABLE_KINDS: ReadonlySet<ErrorKindType> = new Set<ErrorKindType>([
  'Timeout',
  'ConnectionFailure',
  'ClientProtocolFailure',
  'SSLFailure',
]);

const TLS_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_UNTRUSTED',
  'CERT_REVOKED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'HOSTNAME_MISMATCH',
  'EPROTO',
]);

const TLS_CODE_PREFIXES = ['ERR_TLS_', 'ERR_SSL_', 'CERT_'];

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'EHOSTDOWN',
  'ENETUNREACH',
  'ENETDOWN',
  'EPIPE',
  'UND_ERR_SOCKET',
]);

/**
 * First string `code` found on the error or its cause chain
 */
function errorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isTlsCode(code: string): boolean {
  return TLS_CODES.has(code) || TLS_CODE_PREFIXES.some((prefix) => code.startsWith(prefix));
}

/**
 * Classify a thrown transport error. Anything unrecognised becomes a
 * ClientProtocolFailure with the original message kept for diagnostics.
 */
export function classifyError(error: unknown): ClassifiedError {
  const message = errorMessage(error);

  if (error instanceof TransportTimeoutError) {
    return { kind: { type: 'Timeout' }, message };
  }
  if (error instanceof ProxyTunnelError) {
    return { kind: { type: 'ConnectionFailure' }, message: `Connection error: ${message}` };
  }
  if (error instanceof TooManyRedirectsError) {
    return { kind: { type: 'ClientProtocolFailure' }, message: `Client error: ${message}` };
  }

  const code = errorCode(error);
  if (code !== undefined) {
    if (isTlsCode(code)) {
      return { kind: { type: 'SSLFailure' }, message: `SSL certificate error: ${message}` };
    }
    if (TIMEOUT_CODES.has(code)) {
      return { kind: { type: 'Timeout' }, message: `Request timeout: ${message}` };
    }
    if (CONNECTION_CODES.has(code)) {
      return { kind: { type: 'ConnectionFailure' }, message: `Connection error: ${message}` };
    }
  }

  if (error instanceof Error && error.name === 'TimeoutError') {
    return { kind: { type: 'Timeout' }, message: `Request timeout: ${message}` };
  }

  return { kind: { type: 'ClientProtocolFailure' }, message: `Client error: ${message}` };
}

export function httpStatusFailure(code: number, detail: string): ClassifiedError {
  return {
    kind: { type: 'HTTPStatusFailure', code },
    message: `HTTP ${code}: ${detail}`,
  };
}

export function parseFailure(detail: string): ClassifiedError {
  return { kind: { type: 'ParseFailure' }, message: `JSON parse error: ${detail}` };
}

export function isRetryable(kind: ErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind.type);
}

/**
 * Display form, e.g. `HTTPStatusFailure(404)`
 */
export function describeKind(kind: ErrorKind): string {
  return kind.type === 'HTTPStatusFailure' ? `${kind.type}(${kind.code})` : kind.type;
}
