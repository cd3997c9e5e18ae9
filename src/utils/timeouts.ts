/**
 * Central Timeout Configuration
 *
 * All timeout and delay defaults live here so the config schemas, the
 * transport and the browser session agree on them.
 */

/**
 * Default timeout values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Total time for one fetch attempt (connect, headers and body)
   */
  NETWORK_FETCH: 30000,

  /**
   * Base delay before the first retry; doubled after every further attempt
   */
  RETRY_BASE_DELAY: 1000,

  /**
   * Browser navigation (page.goto) timeout
   */
  PAGE_LOAD: 30000,

  /**
   * Idle keep-alive sockets in the transport pool are closed after this
   */
  KEEP_ALIVE: 30000,
} as const;

export type TimeoutKey = keyof typeof TIMEOUTS;
