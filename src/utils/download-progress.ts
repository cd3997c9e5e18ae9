/**
 * Download progress reporting.
 *
 * The engine calls `update` after every chunk written, and only when the
 * server declared a content length.
 */

import { logger, type Logger } from './logger.js';

export interface DownloadProgress {
  url: string;
  bytesWritten: number;
  totalBytes: number;
  /** 0-100, one decimal */
  percent: number;
  /** Bytes per second since the download started */
  bytesPerSecond: number;
}

export interface DownloadProgressReporter {
  update(progress: DownloadProgress): void;
  finish?(progress: DownloadProgress): void;
}

export function computeProgress(
  url: string,
  bytesWritten: number,
  totalBytes: number,
  startTime: number,
  now: number = Date.now()
): DownloadProgress {
  const elapsedSeconds = Math.max((now - startTime) / 1000, 0.001);
  return {
    url,
    bytesWritten,
    totalBytes,
    percent: totalBytes > 0 ? Math.round((bytesWritten / totalBytes) * 1000) / 10 : 0,
    bytesPerSecond: Math.round(bytesWritten / elapsedSeconds),
  };
}

/**
 * Logs progress at debug level, at most once per `stepPercent` points.
 */
export class LoggingProgressReporter implements DownloadProgressReporter {
  private lastLogged = -Infinity;

  constructor(
    private readonly log: Logger = logger.fetchEngine,
    private readonly stepPercent = 10
  ) {}

  update(progress: DownloadProgress): void {
    if (progress.percent - this.lastLogged < this.stepPercent && progress.percent < 100) {
      return;
    }
    this.lastLogged = progress.percent;
    this.log.debug('Download progress', { ...progress });
  }

  finish(progress: DownloadProgress): void {
    this.log.debug('Download complete', { ...progress });
  }
}
