import { describe, it, expect, vi } from 'vitest';
import { computeProgress, LoggingProgressReporter } from '../../src/utils/download-progress.js';
import { Logger } from '../../src/utils/logger.js';

describe('computeProgress', () => {
  it('should compute percent and rate', () => {
    expect(computeProgress('https://a.test/f', 500, 1000, 0, 2000)).toEqual({
      url: 'https://a.test/f',
      bytesWritten: 500,
      totalBytes: 1000,
      percent: 50,
      bytesPerSecond: 250,
    });
  });

  it('should round percent to one decimal', () => {
    expect(computeProgress('u', 1, 3, 0, 1000).percent).toBe(33.3);
  });

  it('should report zero percent for an unknown total', () => {
    expect(computeProgress('u', 10, 0, 0, 1000).percent).toBe(0);
  });
});

describe('LoggingProgressReporter', () => {
  it('should log once per step and always at completion', () => {
    const log = new Logger('Test');
    const debug = vi.spyOn(log, 'debug');
    const reporter = new LoggingProgressReporter(log, 10);

    for (const percent of [5, 10, 15, 100]) {
      reporter.update({ url: 'u', bytesWritten: percent, totalBytes: 100, percent, bytesPerSecond: 1 });
    }
    reporter.finish({ url: 'u', bytesWritten: 100, totalBytes: 100, percent: 100, bytesPerSecond: 1 });

    expect(debug.mock.calls.map(([message, context]) => [message, context?.percent])).toEqual([
      ['Download progress', 5],
      ['Download progress', 15],
      ['Download progress', 100],
      ['Download complete', 100],
    ]);
  });
});
