/**
 * Retrying Fetch Engine
 *
 * One logical fetch or download = a bounded sequence of attempts over the
 * injected transport. Both operations share the same attempt loop, which is
 * a small state machine:
 *
 *   attempting ──ok──────────────────────────────▶ done (success)
 *       │
 *       └─failure─┬─ final kind or last attempt ─▶ done (failure)
 *                 └─ retryable ─▶ backoff ─▶ attempting
 *
 * Each attempt resolves to an outcome value. Transport errors are turned
 * into classified failures at the attempt boundary; only cancellation
 * leaves the loop by throwing (FetchCancelledError).
 */

import { mkdir, open, type FileHandle } from 'node:fs/promises';
import { dirname, resolve as resolvePath } from 'node:path';
import { logger } from '../utils/logger.js';
import { sleep as defaultSleep, type SleepFn } from '../utils/sleep.js';
import { fetchConfigSchema, type FetchConfig } from '../utils/config-schemas.js';
import { NodeHttpTransport, type HttpTransport, type TransportResponse } from '../utils/http-transport.js';
import {
  computeProgress,
  LoggingProgressReporter,
  type DownloadProgressReporter,
} from '../utils/download-progress.js';
import {
  classifyError,
  describeKind,
  FetchCancelledError,
  httpStatusFailure,
  isRetryable,
  parseFailure,
  type ClassifiedError,
} from './error-taxonomy.js';
import type {
  DownloadRequest,
  DownloadRequestInit,
  DownloadResult,
  ErrorKind,
  FetchFailure,
  FetchRequest,
  FetchRequestInit,
  FetchResult,
  JsonFetchResult,
} from '../types/fetch.js';

const log = logger.fetchEngine;

export const DOWNLOAD_CHUNK_SIZE = 8 * 1024;
const STATUS_DETAIL_LENGTH = 200;

// ============================================
// ATTEMPT EVENTS
// ============================================

interface AttemptEventBase {
  /** Engine-wide attempt number, unique per engine instance */
  sequence: number;
  /** Zero-based attempt index within one fetch */
  attempt: number;
  url: string;
}

export type AttemptEvent =
  | (AttemptEventBase & {
      type: 'attempt-start';
      method: string;
      headers: Record<string, string>;
      resourceType: 'fetch' | 'download';
    })
  | (AttemptEventBase & {
      type: 'attempt-response';
      finalUrl: string;
      status: number;
      headers: Record<string, string>;
    })
  | (AttemptEventBase & {
      type: 'attempt-failure';
      kind: ErrorKind;
      message: string;
    })
  | (AttemptEventBase & {
      /** The caller aborted while this attempt was in flight */
      type: 'attempt-cancelled';
      message: string;
    });

/**
 * Observer of individual attempts. Errors it throws or rejects with are
 * logged and otherwise ignored.
 */
export type AttemptListener = (event: AttemptEvent) => void | Promise<void>;

// ============================================
// ENGINE TYPES
// ============================================

export interface FetchEngineDeps {
  transport?: HttpTransport;
  sleep?: SleepFn;
  listener?: AttemptListener;
  progressReporter?: DownloadProgressReporter;
  now?: () => number;
}

export interface FetchEngineStats {
  config: {
    maxRetries: number;
    retryDelayMs: number;
    timeoutMs: number;
    verifyTls: boolean;
    proxy: string | null;
    userAgent: string;
  };
  counters: {
    fetches: number;
    downloads: number;
    successes: number;
    failures: number;
    retries: number;
  };
}

type AttemptOutcome<T> = { ok: true; value: T } | { ok: false; failure: ClassifiedError };

type LoopState<T> =
  | { phase: 'attempting'; attempt: number }
  | { phase: 'backoff'; attempt: number; failure: ClassifiedError }
  | { phase: 'done'; outcome: AttemptOutcome<T>; attempts: number };

interface FetchedBody {
  url: string;
  status: number;
  headers: Record<string, string>;
  content: string;
  size: number;
}

interface WrittenFile {
  url: string;
  status: number;
  bytesWritten: number;
}

// ============================================
// HELPERS
// ============================================

/**
 * UTF-8 first, Latin-1 when the bytes are not valid UTF-8. Never throws.
 */
export function decodeBody(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return Buffer.from(bytes).toString('latin1');
  }
}

async function collectBody(response: TransportResponse): Promise<Buffer> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of response.body) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}

function contentLength(headers: Record<string, string>): number {
  const declared = Number(headers['content-length']);
  return Number.isFinite(declared) && declared > 0 ? declared : 0;
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === wanted);
}

// ============================================
// ENGINE
// ============================================

/**
 * Fetch / download engine with classified failures and exponential backoff.
 *
 * @example
 * ```ts
 * const engine = new RetryingFetchEngine({ maxRetries: 3, retryDelayMs: 500 });
 * const result = await engine.fetch('https://self-signed.example.test/');
 * if (!result.success) console.error(describeKind(result.kind), result.error);
 * ```
 */
export class RetryingFetchEngine {
  private readonly config: FetchConfig;
  private readonly transport: HttpTransport;
  private readonly sleep: SleepFn;
  private readonly listener?: AttemptListener;
  private readonly progressReporter: DownloadProgressReporter;
  private readonly now: () => number;
  private sequence = 0;
  private readonly counters = {
    fetches: 0,
    downloads: 0,
    successes: 0,
    failures: 0,
    retries: 0,
  };

  constructor(config: Partial<FetchConfig> = {}, deps: FetchEngineDeps = {}) {
    this.config = fetchConfigSchema.parse(config);
    this.transport = deps.transport ?? new NodeHttpTransport();
    this.sleep = deps.sleep ?? defaultSleep;
    this.listener = deps.listener;
    this.progressReporter = deps.progressReporter ?? new LoggingProgressReporter();
    this.now = deps.now ?? Date.now;
  }

  // ============================================
  // REQUEST BUILDERS
  // ============================================

  buildRequest(url: string, init: FetchRequestInit = {}): FetchRequest {
    const headers: Record<string, string> = { ...init.headers };
    if (!hasHeader(headers, 'user-agent')) {
      headers['user-agent'] = this.config.userAgent;
    }
    const proxy = init.proxy ?? this.config.proxy;

    return Object.freeze({
      url,
      method: (init.method ?? 'GET').toUpperCase(),
      headers: Object.freeze(headers),
      ...(proxy !== undefined && { proxy }),
      timeoutMs: init.timeoutMs ?? this.config.timeoutMs,
      verifyTls: init.verifyTls ?? this.config.verifyTls,
      ...(init.signal !== undefined && { signal: init.signal }),
    });
  }

  /**
   * Relative destinations resolve against the downloads directory.
   */
  buildDownloadRequest(
    url: string,
    destination: string,
    init: DownloadRequestInit = {}
  ): DownloadRequest {
    return Object.freeze({
      ...this.buildRequest(url, init),
      destination: resolvePath(this.config.downloadsDir, destination),
      showProgress: init.showProgress ?? false,
    });
  }

  // ============================================
  // OPERATIONS
  // ============================================

  async fetch(input: FetchRequest | string): Promise<FetchResult> {
    const request = typeof input === 'string' ? this.buildRequest(input) : input;
    this.counters.fetches++;
    const startTime = this.now();

    const state = await this.runAttempts(request, 'fetch', (attempt, sequence) =>
      this.fetchAttempt(request, attempt, sequence)
    );
    const elapsedMs = this.now() - startTime;

    if (state.outcome.ok) {
      this.counters.successes++;
      log.debug('Fetch succeeded', {
        url: request.url,
        status: state.outcome.value.status,
        attempts: state.attempts,
        durationMs: elapsedMs,
      });
      return {
        success: true,
        ...state.outcome.value,
        elapsedMs,
        tlsVerified: request.verifyTls,
        attempts: state.attempts,
      };
    }

    return this.failureResult(request, state.outcome.failure, elapsedMs, state.attempts);
  }

  /**
   * Fetch, then parse the body as JSON. A body that does not parse gives a
   * ParseFailure whose `fetch` field keeps the successful fetch.
   */
  async fetchJson(input: FetchRequest | string): Promise<JsonFetchResult> {
    const result = await this.fetch(input);
    if (!result.success) {
      return result;
    }

    let json: unknown;
    try {
      json = JSON.parse(result.content);
    } catch (error) {
      const failure = parseFailure(error instanceof Error ? error.message : String(error));
      log.warn('Response body is not valid JSON', { url: result.url, status: result.status });
      return {
        success: false,
        kind: { type: 'ParseFailure' },
        error: failure.message,
        url: result.url,
        elapsedMs: result.elapsedMs,
        attempts: result.attempts,
        fetch: result,
      };
    }
    return { ...result, json };
  }

  /**
   * Stream the body to `request.destination`. A failure mid-stream leaves
   * the partial file in place.
   */
  async download(request: DownloadRequest): Promise<DownloadResult> {
    this.counters.downloads++;
    const startTime = this.now();

    const state = await this.runAttempts(request, 'download', (attempt, sequence) =>
      this.downloadAttempt(request, attempt, sequence, startTime)
    );
    const elapsedMs = this.now() - startTime;

    if (state.outcome.ok) {
      this.counters.successes++;
      log.info('Download complete', {
        url: request.url,
        outputPath: request.destination,
        bytesWritten: state.outcome.value.bytesWritten,
        durationMs: elapsedMs,
      });
      return {
        success: true,
        ...state.outcome.value,
        outputPath: request.destination,
        elapsedMs,
        tlsVerified: request.verifyTls,
        attempts: state.attempts,
      };
    }

    return {
      ...this.failureResult(request, state.outcome.failure, elapsedMs, state.attempts),
      outputPath: request.destination,
    };
  }

  stats(): FetchEngineStats {
    return {
      config: {
        maxRetries: this.config.maxRetries,
        retryDelayMs: this.config.retryDelayMs,
        timeoutMs: this.config.timeoutMs,
        verifyTls: this.config.verifyTls,
        proxy: this.config.proxy ?? null,
        userAgent: this.config.userAgent,
      },
      counters: { ...this.counters },
    };
  }

  /**
   * Release the transport's connection pool
   */
  close(): void {
    this.transport.close();
  }

  // ============================================
  // ATTEMPT LOOP
  // ============================================

  private async runAttempts<T>(
    request: FetchRequest,
    resourceType: 'fetch' | 'download',
    attemptFn: (attempt: number, sequence: number) => Promise<AttemptOutcome<T>>
  ): Promise<Extract<LoopState<T>, { phase: 'done' }>> {
    const maxAttempts = this.config.maxRetries;
    let state: LoopState<T> = { phase: 'attempting', attempt: 0 };

    while (state.phase !== 'done') {
      switch (state.phase) {
        case 'attempting': {
          const attempt: number = state.attempt;
          this.throwIfCancelled(request);

          const sequence = ++this.sequence;
          log.debug('Attempt', {
            url: request.url,
            method: request.method,
            attempt: attempt + 1,
            maxAttempts,
          });
          this.emit({
            type: 'attempt-start',
            sequence,
            attempt,
            url: request.url,
            method: request.method,
            headers: { ...request.headers },
            resourceType,
          });

          const outcome: AttemptOutcome<T> = await this.guard(request, attempt, sequence, () => attemptFn(attempt, sequence));

          if (outcome.ok) {
            state = { phase: 'done', outcome, attempts: attempt + 1 };
            break;
          }

          this.emit({
            type: 'attempt-failure',
            sequence,
            attempt,
            url: request.url,
            kind: outcome.failure.kind,
            message: outcome.failure.message,
          });

          const canRetry = isRetryable(outcome.failure.kind) && attempt + 1 < maxAttempts;
          state = canRetry
            ? { phase: 'backoff', attempt, failure: outcome.failure }
            : { phase: 'done', outcome, attempts: attempt + 1 };
          break;
        }

        case 'backoff': {
          const delayMs = this.config.retryDelayMs * 2 ** state.attempt;
          this.counters.retries++;
          log.warn('Attempt failed, retrying', {
            url: request.url,
            attempt: state.attempt + 1,
            maxAttempts,
            errorKind: describeKind(state.failure.kind),
            error: state.failure.message,
            retryDelayMs: delayMs,
          });
          await this.backoff(request, delayMs);
          state = { phase: 'attempting', attempt: state.attempt + 1 };
          break;
        }
      }
    }

    return state;
  }

  /**
   * The pipeline boundary: anything an attempt throws becomes a classified
   * failure, except cancellation.
   */
  private async guard<T>(
    request: FetchRequest,
    attempt: number,
    sequence: number,
    attemptFn: () => Promise<AttemptOutcome<T>>
  ): Promise<AttemptOutcome<T>> {
    try {
      return await attemptFn();
    } catch (error) {
      const cancelled =
        error instanceof FetchCancelledError
          ? error
          : request.signal?.aborted
            ? new FetchCancelledError(request.url, request.signal.reason)
            : undefined;
      if (cancelled) {
        this.emit({
          type: 'attempt-cancelled',
          sequence,
          attempt,
          url: request.url,
          message: cancelled.message,
        });
        throw cancelled;
      }
      return { ok: false, failure: classifyError(error) };
    }
  }

  private async backoff(request: FetchRequest, delayMs: number): Promise<void> {
    try {
      await this.sleep(delayMs, request.signal);
    } catch (reason) {
      throw new FetchCancelledError(request.url, reason);
    }
  }

  private throwIfCancelled(request: FetchRequest): void {
    if (request.signal?.aborted) {
      throw new FetchCancelledError(request.url, request.signal.reason);
    }
  }

  private failureResult(
    request: FetchRequest,
    failure: ClassifiedError,
    elapsedMs: number,
    attempts: number
  ): FetchFailure {
    this.counters.failures++;
    log.warn('Fetch failed', {
      url: request.url,
      errorKind: describeKind(failure.kind),
      error: failure.message,
      attempts,
      durationMs: elapsedMs,
    });
    return {
      success: false,
      kind: failure.kind,
      error: failure.message,
      url: request.url,
      elapsedMs,
      attempts,
    };
  }

  private emit(event: AttemptEvent): void {
    if (!this.listener) {
      return;
    }
    const onListenerError = (error: unknown) =>
      log.warn('Attempt listener failed', {
        url: event.url,
        eventType: event.type,
        error: error instanceof Error ? error.message : String(error),
      });
    try {
      const returned = this.listener(event);
      if (returned instanceof Promise) {
        returned.catch(onListenerError);
      }
    } catch (error) {
      onListenerError(error);
    }
  }

  // ============================================
  // SINGLE ATTEMPTS
  // ============================================

  private async fetchAttempt(
    request: FetchRequest,
    attempt: number,
    sequence: number
  ): Promise<AttemptOutcome<FetchedBody>> {
    const response = await this.transport.request(request);
    this.emit({
      type: 'attempt-response',
      sequence,
      attempt,
      url: request.url,
      finalUrl: response.url,
      status: response.status,
      headers: { ...response.headers },
    });

    const bytes = await collectBody(response);

    if (response.status >= 400) {
      const detail = decodeBody(bytes).slice(0, STATUS_DETAIL_LENGTH);
      return { ok: false, failure: httpStatusFailure(response.status, detail) };
    }

    return {
      ok: true,
      value: {
        url: response.url,
        status: response.status,
        headers: response.headers,
        content: decodeBody(bytes),
        size: bytes.length,
      },
    };
  }

  private async downloadAttempt(
    request: DownloadRequest,
    attempt: number,
    sequence: number,
    startTime: number
  ): Promise<AttemptOutcome<WrittenFile>> {
    const response = await this.transport.request(request);
    this.emit({
      type: 'attempt-response',
      sequence,
      attempt,
      url: request.url,
      finalUrl: response.url,
      status: response.status,
      headers: { ...response.headers },
    });

    if (response.status >= 400) {
      response.discard();
      return { ok: false, failure: httpStatusFailure(response.status, 'Failed to download file') };
    }

    const totalBytes = contentLength(response.headers);
    const reportProgress = request.showProgress && totalBytes > 0;
    let bytesWritten = 0;

    let handle: FileHandle;
    try {
      await mkdir(dirname(request.destination), { recursive: true });
      handle = await open(request.destination, 'w');
    } catch (error) {
      response.discard();
      throw error;
    }

    try {
      for await (const chunk of response.body) {
        for (let offset = 0; offset < chunk.length; offset += DOWNLOAD_CHUNK_SIZE) {
          const piece = chunk.subarray(offset, offset + DOWNLOAD_CHUNK_SIZE);
          await handle.write(piece);
          bytesWritten += piece.length;
          if (reportProgress) {
            this.progressReporter.update(
              computeProgress(request.url, bytesWritten, totalBytes, startTime, this.now())
            );
          }
        }
      }
    } finally {
      response.discard();
      await handle.close();
    }

    if (reportProgress) {
      this.progressReporter.finish?.(
        computeProgress(request.url, bytesWritten, totalBytes, startTime, this.now())
      );
    }

    return { ok: true, value: { url: response.url, status: response.status, bytesWritten } };
  }
}
