/**
 * Batch fan-out over the fetch engine.
 *
 * Every URL is fetched concurrently; result[i] always answers urls[i].
 */

import { logger } from '../utils/logger.js';
import { FetchCancelledError } from './error-taxonomy.js';
import type { RetryingFetchEngine } from './fetch-engine.js';
import type { FetchRequestInit, FetchResult } from '../types/fetch.js';

const log = logger.batch;

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
}

export function summarizeBatch(results: readonly FetchResult[]): BatchSummary {
  const succeeded = results.filter((result) => result.success).length;
  return { total: results.length, succeeded, failed: results.length - succeeded };
}

/**
 * Fetch all URLs at once. A fault outside the engine's own classification
 * becomes a ClientProtocolFailure at that index; cancellation propagates.
 */
export async function batchFetch(
  engine: Pick<RetryingFetchEngine, 'fetch' | 'buildRequest'>,
  urls: readonly string[],
  init: FetchRequestInit = {}
): Promise<FetchResult[]> {
  const startTime = Date.now();

  const settled = await Promise.allSettled(
    urls.map(async (url) => engine.fetch(engine.buildRequest(url, init)))
  );

  const results = settled.map((outcome, index): FetchResult => {
    if (outcome.status === 'fulfilled') {
      return outcome.value;
    }
    if (outcome.reason instanceof FetchCancelledError) {
      throw outcome.reason;
    }
    const message = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
    log.error('Unexpected fault in fetch pipeline', { url: urls[index], error: outcome.reason });
    return {
      success: false,
      kind: { type: 'ClientProtocolFailure' },
      error: `Client error: ${message}`,
      url: urls[index],
      elapsedMs: Date.now() - startTime,
      attempts: 0,
    };
  });

  const summary = summarizeBatch(results);
  log.timed('Batch fetch complete', startTime, { ...summary });
  return results;
}
