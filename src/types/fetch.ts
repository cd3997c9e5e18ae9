/**
 * Fetch / Download Types
 *
 * Value types exchanged with the retrying fetch engine. Requests are
 * frozen on construction; results are tagged on `success`.
 */

/**
 * Failure classification for a single attempt.
 *
 * Exactly one kind is assigned per failed attempt. `HTTPStatusFailure`
 * carries the status code the server answered with.
 */
export type ErrorKind =
  | { type: 'SSLFailure' }
  | { type: 'Timeout' }
  | { type: 'ConnectionFailure' }
  | { type: 'ClientProtocolFailure' }
  | { type: 'HTTPStatusFailure'; code: number }
  | { type: 'ParseFailure' };

export type ErrorKindType = ErrorKind['type'];

export interface FetchRequest {
  readonly url: string;
  readonly method: string;
  readonly headers: Readonly<Record<string, string>>;
  /** Proxy endpoint, e.g. http://127.0.0.1:8080 */
  readonly proxy?: string;
  readonly timeoutMs: number;
  readonly verifyTls: boolean;
  /** Cancels the in-flight attempt and any pending backoff */
  readonly signal?: AbortSignal;
}

export interface DownloadRequest extends FetchRequest {
  readonly destination: string;
  readonly showProgress: boolean;
}

export interface FetchSuccess {
  success: true;
  /** Final URL after redirects */
  url: string;
  status: number;
  headers: Record<string, string>;
  content: string;
  /** Raw payload length in bytes */
  size: number;
  elapsedMs: number;
  tlsVerified: boolean;
  attempts: number;
}

export interface FetchFailure {
  success: false;
  kind: ErrorKind;
  error: string;
  /** The URL originally requested */
  url: string;
  elapsedMs: number;
  attempts: number;
}

export type FetchResult = FetchSuccess | FetchFailure;

export interface JsonFetchSuccess extends FetchSuccess {
  json: unknown;
}

/**
 * Body was fetched but could not be parsed. `fetch` keeps the successful
 * fetch so callers can still inspect status and raw content.
 */
export interface JsonParseFailure extends FetchFailure {
  kind: { type: 'ParseFailure' };
  fetch: FetchSuccess;
}

export type JsonFetchResult = JsonFetchSuccess | JsonParseFailure | FetchFailure;

export interface DownloadSuccess {
  success: true;
  url: string;
  status: number;
  outputPath: string;
  bytesWritten: number;
  elapsedMs: number;
  tlsVerified: boolean;
  attempts: number;
}

export interface DownloadFailure extends FetchFailure {
  outputPath: string;
}

export type DownloadResult = DownloadSuccess | DownloadFailure;

/**
 * Options accepted by the request builders. Anything omitted falls back
 * to the engine configuration.
 */
export interface FetchRequestInit {
  method?: string;
  headers?: Record<string, string>;
  proxy?: string;
  timeoutMs?: number;
  verifyTls?: boolean;
  signal?: AbortSignal;
}

export interface DownloadRequestInit extends FetchRequestInit {
  showProgress?: boolean;
}
