/**
 * Bridge Runtime
 *
 * The one long-lived context object: owns the fetch engine, session store,
 * network recorder and (once a browser tool needs it) the browser session.
 * Nothing here is module-level state; create as many runtimes as needed.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { configureLogger, logger } from './utils/logger.js';
import type { BridgeConfig } from './utils/config-schemas.js';
import type { HttpTransport } from './utils/http-transport.js';
import type { SleepFn } from './utils/sleep.js';
import type { DownloadProgressReporter } from './utils/download-progress.js';
import { RetryingFetchEngine, type AttemptListener } from './core/fetch-engine.js';
import { SessionStore } from './core/session-store.js';
import { NetworkRecorder } from './core/network-recorder.js';
import { BrowserSession, type BrowserSessionOptions } from './core/browser-session.js';

const log = logger.runtime;

export type BrowserSessionFactory = (
  sessions: SessionStore,
  recorder: NetworkRecorder,
  options: BrowserSessionOptions
) => BrowserSession;

export interface BridgeRuntimeDeps {
  transport?: HttpTransport;
  sleep?: SleepFn;
  fetchListener?: AttemptListener;
  progressReporter?: DownloadProgressReporter;
  createBrowser?: BrowserSessionFactory;
  /** Apply `config.log` to the shared logger on initialize (default: true) */
  configureLogging?: boolean;
}

export class BridgeRuntime {
  readonly engine: RetryingFetchEngine;
  readonly sessions: SessionStore;
  readonly recorder: NetworkRecorder;
  private browser: BrowserSession | null = null;
  private readonly createBrowser: BrowserSessionFactory;
  private initialized = false;

  constructor(
    readonly config: BridgeConfig,
    private readonly deps: BridgeRuntimeDeps = {}
  ) {
    this.recorder = new NetworkRecorder({
      maxEvents: config.network.maxEvents,
      summarySize: config.network.summarySize,
    });
    this.engine = new RetryingFetchEngine(config.fetch, {
      transport: deps.transport,
      sleep: deps.sleep,
      listener: this.fetchListener(deps.fetchListener),
      progressReporter: deps.progressReporter,
    });
    this.sessions = new SessionStore(config.session.sessionsDir);
    this.createBrowser =
      deps.createBrowser ?? ((sessions, recorder, options) => new BrowserSession(sessions, recorder, options));
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    if (this.deps.configureLogging ?? true) {
      configureLogger({ level: this.config.log.level, prettyPrint: this.config.log.prettyPrint });
    }
    await this.sessions.initialize();
    await fs.mkdir(this.config.fetch.downloadsDir, { recursive: true });
    this.initialized = true;
    log.info('Runtime initialized', {
      sessionsDir: this.config.session.sessionsDir,
      downloadsDir: this.config.fetch.downloadsDir,
    });
  }

  /**
   * The browser session, created on first use (not yet launched)
   */
  getBrowser(): BrowserSession {
    if (!this.browser) {
      this.browser = this.createBrowser(this.sessions, this.recorder, {
        headless: this.config.browser.headless,
        proxy: this.config.browser.proxy,
        navigationTimeoutMs: this.config.browser.navigationTimeoutMs,
        userAgent: this.config.fetch.userAgent,
      });
    }
    return this.browser;
  }

  /**
   * The browser session only if it has been launched
   */
  activeBrowser(): BrowserSession | undefined {
    return this.browser?.isInitialized() ? this.browser : undefined;
  }

  /**
   * With `network.recordFetches`, engine attempts land in the recorder
   * ahead of any caller-supplied listener.
   */
  private fetchListener(extra?: AttemptListener): AttemptListener | undefined {
    if (!this.config.network.recordFetches) {
      return extra;
    }
    const record = this.recorder.attemptListener();
    if (!extra) {
      return record;
    }
    return (event) => {
      record(event);
      return extra(event);
    };
  }

  resolveDownloadPath(filename: string): string {
    return path.resolve(this.config.fetch.downloadsDir, filename);
  }

  async shutdown(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    try {
      if (browser) {
        await browser.close();
      }
    } finally {
      this.engine.close();
      this.initialized = false;
      log.info('Runtime shut down');
    }
  }
}
