/**
 * Network Activity Recorder
 *
 * Two append-only sequences (requests, responses), each capped by a ring
 * buffer. Counts are running totals since the last clear(), so summary()
 * costs the same however many events were seen. Requests get a
 * correlation id that responses can carry back.
 */

import { randomUUID } from 'node:crypto';
import { rename, unlink, writeFile } from 'node:fs/promises';
import { logger } from '../utils/logger.js';
import { RingBuffer } from '../utils/ring-buffer.js';
import { convertToHar, serializeHar } from '../utils/har-converter.js';
import type { AttemptEvent, AttemptListener } from './fetch-engine.js';
import type {
  NetworkRequestEvent,
  NetworkResponseEvent,
  NetworkSummary,
  RequestEventInput,
  ResponseEventInput,
} from '../types/network.js';

const log = logger.network;

export interface NetworkRecorderOptions {
  /** Cap per sequence (default: 10000) */
  maxEvents?: number;
  /** Recent events per sequence in summary() (default: 10) */
  summarySize?: number;
  enabled?: boolean;
  now?: () => Date;
}

export class NetworkRecorder {
  private readonly requests: RingBuffer<NetworkRequestEvent>;
  private readonly responses: RingBuffer<NetworkResponseEvent>;
  private readonly summarySize: number;
  private readonly now: () => Date;
  private enabled: boolean;
  private nextId = 1;
  private totalRequests = 0;
  private totalResponses = 0;
  private failedResponses = 0;
  private droppedEvents = 0;

  constructor(options: NetworkRecorderOptions = {}) {
    const maxEvents = options.maxEvents ?? 10000;
    this.requests = new RingBuffer(maxEvents);
    this.responses = new RingBuffer(maxEvents);
    this.summarySize = options.summarySize ?? 10;
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? (() => new Date());
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    log.debug('Recording toggled', { enabled });
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * @returns the correlation id, or undefined while disabled
   */
  recordRequest(input: RequestEventInput): string | undefined {
    if (!this.enabled) {
      return undefined;
    }
    const id = `req-${this.nextId++}`;
    const event: NetworkRequestEvent = {
      kind: 'request',
      id,
      timestamp: input.timestamp ?? this.now().toISOString(),
      method: input.method,
      url: input.url,
      headers: { ...input.headers },
      resourceType: input.resourceType,
    };
    this.totalRequests++;
    if (this.requests.push(event)) {
      this.droppedEvents++;
    }
    return id;
  }

  recordResponse(input: ResponseEventInput): void {
    if (!this.enabled) {
      return;
    }
    const event: NetworkResponseEvent = {
      kind: 'response',
      ...(input.requestId !== undefined && { requestId: input.requestId }),
      timestamp: input.timestamp ?? this.now().toISOString(),
      url: input.url,
      status: input.status,
      headers: { ...input.headers },
      ok: input.status > 0 && input.status < 400,
      ...(input.errorText !== undefined && { errorText: input.errorText }),
    };
    this.appendResponse(event);
  }

  /**
   * A request that never got an answer (DNS, TLS, reset, abort)
   */
  recordFailure(requestId: string | undefined, url: string, errorText: string): void {
    this.recordResponse({ requestId, url, status: 0, headers: {}, errorText });
  }

  summary(): NetworkSummary {
    return {
      totalRequests: this.totalRequests,
      totalResponses: this.totalResponses,
      failedResponses: this.failedResponses,
      droppedEvents: this.droppedEvents,
      requests: this.requests.last(this.summarySize),
      responses: this.responses.last(this.summarySize),
    };
  }

  getRequests(): NetworkRequestEvent[] {
    return this.requests.toArray();
  }

  getResponses(): NetworkResponseEvent[] {
    return this.responses.toArray();
  }

  clear(): void {
    this.requests.clear();
    this.responses.clear();
    this.totalRequests = 0;
    this.totalResponses = 0;
    this.failedResponses = 0;
    this.droppedEvents = 0;
    log.debug('Network log cleared');
  }

  /**
   * HAR 1.2 JSON of everything still buffered. Does not clear.
   */
  exportTrace(): string {
    return serializeHar(convertToHar(this.requests.toArray(), this.responses.toArray()));
  }

  /**
   * Write the trace next to `path` first, then rename over it.
   */
  async writeTrace(path: string): Promise<string> {
    const tempPath = `${path}.${randomUUID()}.tmp`;
    try {
      await writeFile(tempPath, this.exportTrace(), 'utf-8');
      await rename(tempPath, path);
    } catch (error) {
      await unlink(tempPath).catch((cleanupError: unknown) =>
        log.debug('Temp trace cleanup skipped', { path: tempPath, error: String(cleanupError) })
      );
      throw error;
    }
    log.info('Network trace written', { path, entries: this.requests.size });
    return path;
  }

  /**
   * Adapter feeding fetch-engine attempts into this recorder
   */
  attemptListener(): AttemptListener {
    const ids = new Map<number, string | undefined>();

    return (event: AttemptEvent) => {
      switch (event.type) {
        case 'attempt-start':
          ids.set(
            event.sequence,
            this.recordRequest({
              method: event.method,
              url: event.url,
              headers: event.headers,
              resourceType: event.resourceType,
            })
          );
          break;
        case 'attempt-response':
          this.recordResponse({
            requestId: ids.get(event.sequence),
            url: event.finalUrl,
            status: event.status,
            headers: event.headers,
          });
          ids.delete(event.sequence);
          break;
        case 'attempt-failure':
        case 'attempt-cancelled':
          // HTTP status failures already produced their response event
          if (ids.has(event.sequence)) {
            this.recordFailure(ids.get(event.sequence), event.url, event.message);
            ids.delete(event.sequence);
          }
          break;
      }
    };
  }

  private appendResponse(event: NetworkResponseEvent): void {
    this.totalResponses++;
    if (!event.ok) {
      this.failedResponses++;
    }
    if (this.responses.push(event)) {
      this.droppedEvents++;
    }
  }
}
