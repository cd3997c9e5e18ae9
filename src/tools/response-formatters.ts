/**
 * Tool Response Formatters
 *
 * Every tool answers with one JSON text block. Failures set `isError` and
 * carry the error kind and message.
 */

import { describeKind } from '../core/error-taxonomy.js';
import type { ErrorKind, FetchResult } from '../types/fetch.js';

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export const FETCH_PREVIEW_CHARS = 1000;
export const BATCH_PREVIEW_CHARS = 500;

export function jsonResponse(data: object, indent: number = 2): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, indent) }],
  };
}

/**
 * Error response; `kind` is an ErrorKind or a storage/validation label
 */
export function errorResponse(
  kind: ErrorKind | string,
  message: string,
  details: Record<string, unknown> = {}
): ToolResponse {
  const label = typeof kind === 'string' ? kind : describeKind(kind);
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify({ success: false, kind: label, error: message, ...details }, null, 2),
      },
    ],
    isError: true,
  };
}

export interface TruncatedText {
  text: string;
  truncated: boolean;
}

export function truncate(text: string, maxChars: number): TruncatedText {
  return text.length > maxChars
    ? { text: text.slice(0, maxChars), truncated: true }
    : { text, truncated: false };
}

/**
 * Success → result with a content preview, failure → kind and message.
 */
export function formatFetchResult(result: FetchResult, maxChars: number): Record<string, unknown> {
  if (!result.success) {
    return {
      success: false,
      url: result.url,
      kind: describeKind(result.kind),
      error: result.error,
      attempts: result.attempts,
      elapsedMs: result.elapsedMs,
    };
  }
  const preview = truncate(result.content, maxChars);
  return {
    success: true,
    url: result.url,
    status: result.status,
    headers: result.headers,
    size: result.size,
    elapsedMs: result.elapsedMs,
    tlsVerified: result.tlsVerified,
    attempts: result.attempts,
    content: preview.text,
    ...(preview.truncated && { content_truncated: true }),
  };
}
