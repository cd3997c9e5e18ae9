/**
 * HAR Converter Utility
 *
 * Turns the recorder's request and response sequences into a HAR 1.2
 * document. Responses are matched to requests by correlation id; requests
 * that carry no matched response fall back to positional pairing with the
 * leftover responses, and those entries are marked approximate.
 */

import type { Har, HarEntry, HarHeader } from '../types/har.js';
import type { NetworkRequestEvent, NetworkResponseEvent } from '../types/network.js';

export const HAR_VERSION = '1.2';
export const HAR_CREATOR = { name: 'lenient-web-bridge', version: '0.1.0' } as const;
export const POSITIONAL_PAIRING_COMMENT = 'paired by position (approximate)';

/**
 * Convert headers object to HAR headers array
 */
export function convertHeaders(headers: Record<string, string>): HarHeader[] {
  return Object.entries(headers).map(([name, value]) => ({ name, value }));
}

function toEntry(
  request: NetworkRequestEvent,
  response: NetworkResponseEvent,
  approximate: boolean
): HarEntry {
  const entry: HarEntry = {
    startedDateTime: request.timestamp,
    request: {
      method: request.method,
      url: request.url,
      headers: convertHeaders(request.headers),
    },
    response: {
      status: response.status,
      headers: convertHeaders(response.headers),
    },
  };
  if (approximate) {
    entry.comment = POSITIONAL_PAIRING_COMMENT;
  }
  return entry;
}

/**
 * Pair requests with responses, in request order.
 *
 * Requests without any response are left out, as are responses that
 * neither name a recorded request nor find an unpaired one by position.
 */
export function pairEvents(
  requests: readonly NetworkRequestEvent[],
  responses: readonly NetworkResponseEvent[]
): HarEntry[] {
  const byRequestId = new Map<string, NetworkResponseEvent>();
  const requestIds = new Set(requests.map((request) => request.id));
  const unmatched: NetworkResponseEvent[] = [];

  for (const response of responses) {
    if (
      response.requestId !== undefined &&
      requestIds.has(response.requestId) &&
      !byRequestId.has(response.requestId)
    ) {
      byRequestId.set(response.requestId, response);
    } else if (response.requestId === undefined) {
      unmatched.push(response);
    }
  }

  const entries: HarEntry[] = [];
  let position = 0;
  for (const request of requests) {
    const matched = byRequestId.get(request.id);
    if (matched) {
      entries.push(toEntry(request, matched, false));
      continue;
    }
    const fallback = unmatched[position];
    if (fallback) {
      position++;
      entries.push(toEntry(request, fallback, true));
    }
  }
  return entries;
}

export function convertToHar(
  requests: readonly NetworkRequestEvent[],
  responses: readonly NetworkResponseEvent[]
): Har {
  return {
    log: {
      version: HAR_VERSION,
      creator: { ...HAR_CREATOR },
      entries: pairEvents(requests, responses),
    },
  };
}

/**
 * Serialize HAR to JSON string
 */
export function serializeHar(har: Har, pretty = true): string {
  return JSON.stringify(har, null, pretty ? 2 : undefined);
}
