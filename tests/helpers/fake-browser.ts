/**
 * In-process stand-in for the slice of playwright-core the browser session
 * drives. Install with:
 *
 *   vi.mock('playwright-core', async () => {
 *     const { fakeChromium } = await import('../helpers/fake-browser.js');
 *     return { chromium: fakeChromium };
 *   });
 */

import { vi } from 'vitest';

export interface FakeCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires: number;
  httpOnly: boolean;
  secure: boolean;
  sameSite: 'Strict' | 'Lax' | 'None';
}

export type FakeCookieInput = Pick<FakeCookie, 'name' | 'value' | 'domain'> & Partial<FakeCookie>;

export class FakeRequest {
  constructor(
    private readonly target: string,
    private readonly failureText?: string
  ) {}

  method(): string {
    return 'GET';
  }

  url(): string {
    return this.target;
  }

  headers(): Record<string, string> {
    return { accept: 'text/html' };
  }

  resourceType(): string {
    return 'document';
  }

  failure(): { errorText: string } | null {
    return this.failureText === undefined ? null : { errorText: this.failureText };
  }
}

export class FakeResponse {
  constructor(
    private readonly origin: FakeRequest,
    private readonly code: number
  ) {}

  url(): string {
    return this.origin.url();
  }

  status(): number {
    return this.code;
  }

  headers(): Record<string, string> {
    return { 'content-type': 'text/html' };
  }

  request(): FakeRequest {
    return this.origin;
  }
}

type Listener = (payload: FakeRequest | FakeResponse) => void;

export class FakePage {
  private current = 'about:blank';
  private readonly listeners = new Map<string, Listener[]>();
  /** Status per URL; anything else answers 200 */
  readonly statuses = new Map<string, number>();

  on(event: string, listener: Listener): this {
    this.listeners.set(event, [...(this.listeners.get(event) ?? []), listener]);
    return this;
  }

  url(): string {
    return this.current;
  }

  async title(): Promise<string> {
    return `Title of ${this.current}`;
  }

  async goto(url: string): Promise<FakeResponse> {
    const request = new FakeRequest(url);
    this.emit('request', request);
    const response = new FakeResponse(request, this.statuses.get(url) ?? 200);
    this.emit('response', response);
    this.current = url;
    return response;
  }

  /** A request the page starts that never gets a response */
  failRequest(url: string, errorText: string): void {
    const request = new FakeRequest(url, errorText);
    this.emit('request', request);
    this.emit('requestfailed', request);
  }

  private emit(event: string, payload: FakeRequest | FakeResponse): void {
    for (const listener of this.listeners.get(event) ?? []) {
      listener(payload);
    }
  }
}

export class FakeContext {
  readonly jar: FakeCookie[] = [];
  readonly pages: FakePage[] = [];
  readonly addCookies = vi.fn(async (cookies: FakeCookieInput[]) => {
    for (const cookie of cookies) {
      this.jar.push({
        path: '/',
        expires: -1,
        httpOnly: false,
        secure: false,
        sameSite: 'Lax',
        ...cookie,
      });
    }
  });
  closed = false;

  constructor(readonly options: Record<string, unknown>) {}

  async cookies(): Promise<FakeCookie[]> {
    return this.jar.map((cookie) => ({ ...cookie }));
  }

  async newPage(): Promise<FakePage> {
    const page = new FakePage();
    this.pages.push(page);
    return page;
  }

  readonly close = vi.fn(async () => {
    this.closed = true;
  });
}

export class FakeBrowser {
  readonly contexts: FakeContext[] = [];
  closed = false;

  readonly newContext = vi.fn(async (options: Record<string, unknown>) => {
    const context = new FakeContext(options);
    this.contexts.push(context);
    return context;
  });

  async close(): Promise<void> {
    this.closed = true;
  }
}

const browsers: FakeBrowser[] = [];

export const fakeChromium = {
  browsers,
  launch: vi.fn(async (_options?: Record<string, unknown>) => {
    const browser = new FakeBrowser();
    browsers.push(browser);
    return browser;
  }),
};

/**
 * The most recently launched page and context
 */
export function lastLaunched(): { browser: FakeBrowser; context: FakeContext; page: FakePage } {
  const browser = browsers[browsers.length - 1];
  const context = browser?.contexts[0];
  const page = context?.pages[0];
  if (!browser || !context || !page) {
    throw new Error('No fake browser has been launched');
  }
  return { browser, context, page };
}

export function resetFakeChromium(): void {
  browsers.length = 0;
  fakeChromium.launch.mockClear();
}
