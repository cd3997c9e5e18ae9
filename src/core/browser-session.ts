/**
 * Browser Session - one Chromium browser/context/page with explicit lifecycle
 *
 * Certificate errors are ignored, like the fetch engine's default. Page
 * traffic is fed into a NetworkRecorder with correlation ids; cookies move
 * in and out of the SessionStore as copies.
 */

import { chromium } from 'playwright-core';
import type { Browser, BrowserContext, Cookie, Page, Request, Response } from 'playwright-core';
import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { DEFAULT_USER_AGENT } from '../utils/config-schemas.js';
import { toSessionInfo, type SessionStore } from './session-store.js';
import type { NetworkRecorder } from './network-recorder.js';
import type { NetworkSummary } from '../types/network.js';
import type { SessionCookie, SessionInfo, SessionLoadResult, SessionSaveResult } from '../types/session.js';

const log = logger.browser;

export interface BrowserSessionOptions {
  headless?: boolean;
  /** Proxy server for the browser, e.g. http://127.0.0.1:8080 */
  proxy?: string;
  navigationTimeoutMs?: number;
  userAgent?: string;
}

export interface NavigationResult {
  url: string;
  status: number | null;
  title: string;
}

export type BrowserLoadResult =
  | { loaded: true; session: SessionInfo; navigatedTo?: NavigationResult }
  | { loaded: false; failure: Exclude<SessionLoadResult, { found: true }> };

interface ActiveBrowser {
  browser: Browser;
  context: BrowserContext;
  page: Page;
}

// ============================================
// COOKIE BOUNDARY
// ============================================

export function fromBrowserCookie(cookie: Cookie): SessionCookie {
  return {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    expires: cookie.expires,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    sameSite: cookie.sameSite,
  };
}

export async function captureCookies(context: Pick<BrowserContext, 'cookies'>): Promise<SessionCookie[]> {
  const cookies = await context.cookies();
  return cookies.map(fromBrowserCookie);
}

export async function restoreCookies(
  context: Pick<BrowserContext, 'addCookies'>,
  cookies: readonly SessionCookie[]
): Promise<number> {
  if (cookies.length === 0) {
    return 0;
  }
  await context.addCookies(
    cookies.map((cookie) => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path ?? '/',
      ...(cookie.expires !== undefined && { expires: cookie.expires }),
      ...(cookie.httpOnly !== undefined && { httpOnly: cookie.httpOnly }),
      ...(cookie.secure !== undefined && { secure: cookie.secure }),
      ...(cookie.sameSite !== undefined && { sameSite: cookie.sameSite }),
    }))
  );
  return cookies.length;
}

// ============================================
// SESSION
// ============================================

export class BrowserSession {
  private active: ActiveBrowser | null = null;
  private starting: Promise<ActiveBrowser> | null = null;
  private readonly requestIds = new WeakMap<Request, string>();

  constructor(
    private readonly sessions: SessionStore,
    private readonly recorder: NetworkRecorder,
    private readonly options: BrowserSessionOptions = {}
  ) {}

  isInitialized(): boolean {
    return this.active !== null;
  }

  /**
   * Launch the browser. Safe to call repeatedly.
   */
  async initialize(): Promise<void> {
    await this.ensureActive();
  }

  async navigate(url: string): Promise<NavigationResult> {
    const { page } = await this.ensureActive();
    const startTime = Date.now();
    const response = await page.goto(url, {
      waitUntil: 'domcontentloaded',
      timeout: this.options.navigationTimeoutMs ?? TIMEOUTS.PAGE_LOAD,
    });
    const result: NavigationResult = {
      url: page.url(),
      status: response ? response.status() : null,
      title: await page.title(),
    };
    log.timed('Navigated', startTime, { url: result.url, status: result.status ?? undefined });
    return result;
  }

  currentUrl(): string | undefined {
    return this.active?.page.url();
  }

  /**
   * Save the context's cookies and current URL under `name`
   */
  async saveSession(name: string): Promise<SessionSaveResult> {
    const { context, page } = await this.ensureActive();
    const cookies = await captureCookies(context);
    const url = page.url();
    return this.sessions.save(cookies, url === 'about:blank' ? undefined : url, name);
  }

  /**
   * Restore cookies from `name`. Navigation to the saved URL happens only
   * with `autoNavigate`.
   */
  async loadSession(name: string, options: { autoNavigate?: boolean } = {}): Promise<BrowserLoadResult> {
    const result = await this.sessions.load(name);
    if (!result.found) {
      return { loaded: false, failure: result };
    }

    const { context } = await this.ensureActive();
    const restored = await restoreCookies(context, result.record.cookies);
    log.info('Session restored', { sessionName: name, cookieCount: restored });

    const session = toSessionInfo(result.record);
    if (options.autoNavigate && result.record.current_url) {
      return { loaded: true, session, navigatedTo: await this.navigate(result.record.current_url) };
    }
    return { loaded: true, session };
  }

  networkSummary(): NetworkSummary {
    return this.recorder.summary();
  }

  async exportTrace(path: string): Promise<string> {
    return this.recorder.writeTrace(path);
  }

  async close(): Promise<void> {
    const starting = this.starting;
    this.starting = null;
    const active =
      this.active ??
      (starting
        ? await starting.catch((error: unknown) => {
            log.warn('Browser launch failed before close', { error: String(error) });
            return null;
          })
        : null);
    this.active = null;
    if (!active) {
      return;
    }
    try {
      await active.context.close();
    } finally {
      await active.browser.close();
    }
    log.info('Browser closed');
  }

  private async ensureActive(): Promise<ActiveBrowser> {
    if (this.active) {
      return this.active;
    }
    this.starting ??= this.launch();
    try {
      this.active = await this.starting;
      return this.active;
    } finally {
      this.starting = null;
    }
  }

  private async launch(): Promise<ActiveBrowser> {
    const browser = await chromium.launch({
      headless: this.options.headless ?? true,
      ...(this.options.proxy !== undefined && { proxy: { server: this.options.proxy } }),
    });
    try {
      const context = await browser.newContext({
        ignoreHTTPSErrors: true,
        viewport: { width: 1920, height: 1080 },
        userAgent: this.options.userAgent ?? DEFAULT_USER_AGENT,
      });
      const page = await context.newPage();
      this.attachRecorder(page);
      log.info('Browser launched', { headless: this.options.headless ?? true });
      return { browser, context, page };
    } catch (error) {
      await browser.close().catch((closeError: unknown) => {
        log.warn('Failed to close browser after launch error', { error: String(closeError) });
      });
      throw error;
    }
  }

  private attachRecorder(page: Page): void {
    page.on('request', (request: Request) => {
      const id = this.recorder.recordRequest({
        method: request.method(),
        url: request.url(),
        headers: request.headers(),
        resourceType: request.resourceType(),
      });
      if (id !== undefined) {
        this.requestIds.set(request, id);
      }
    });

    page.on('response', (response: Response) => {
      this.recorder.recordResponse({
        requestId: this.requestIds.get(response.request()),
        url: response.url(),
        status: response.status(),
        headers: response.headers(),
      });
    });

    page.on('requestfailed', (request: Request) => {
      this.recorder.recordFailure(
        this.requestIds.get(request),
        request.url(),
        request.failure()?.errorText ?? 'Request failed'
      );
    });
  }
}
