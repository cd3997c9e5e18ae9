/**
 * HTTP Transport with Connection Pooling
 *
 * The injected transport behind the fetch engine:
 * - Keep-alive http/https agents shared by every request of one engine
 * - Per-request certificate verification switch (rejectUnauthorized)
 * - Redirect following
 * - One time budget per attempt, covering headers and body
 * - HTTP proxies: absolute-URI forwarding for http://, CONNECT tunnel for https://
 * - Caller cancellation through AbortSignal
 *
 * Bodies are handed out as async byte streams; the socket is released when
 * the stream ends, fails, or is discarded.
 */

import * as http from 'node:http';
import * as https from 'node:https';
import * as tls from 'node:tls';
import { isIP } from 'node:net';
import { logger } from './logger.js';
import { TIMEOUTS } from './timeouts.js';
import {
  ProxyTunnelError,
  TooManyRedirectsError,
  TransportTimeoutError,
} from '../core/error-taxonomy.js';

const log = logger.transport;

// ============================================
// TYPES
// ============================================

export interface TransportRequest {
  url: string;
  method: string;
  headers: Readonly<Record<string, string>>;
  proxy?: string;
  timeoutMs: number;
  verifyTls: boolean;
  signal?: AbortSignal;
}

export interface TransportResponse {
  /** Final URL after redirects */
  url: string;
  status: number;
  headers: Record<string, string>;
  body: AsyncIterable<Uint8Array>;
  /** Drop the unread body and release the connection */
  discard(): void;
}

export interface HttpTransport {
  request(request: TransportRequest): Promise<TransportResponse>;
  close(): void;
}

export interface NodeHttpTransportConfig {
  /** Maximum sockets per host (default: 10) */
  maxSockets?: number;
  /** Maximum total sockets across all hosts (default: 50) */
  maxTotalSockets?: number;
  keepAliveMs?: number;
  maxRedirects?: number;
}

export interface TransportStats {
  totalRequests: number;
  activeSockets: number;
  freeSockets: number;
}

const DEFAULT_CONFIG: Required<NodeHttpTransportConfig> = {
  maxSockets: 10,
  maxTotalSockets: 50,
  keepAliveMs: TIMEOUTS.KEEP_ALIVE,
  maxRedirects: 10,
};

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

// ============================================
// HELPERS
// ============================================

export function flattenHeaders(headers: http.IncomingHttpHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      flat[name] = value.join(', ');
    } else if (typeof value === 'string') {
      flat[name] = value;
    }
  }
  return flat;
}

function proxyAuthorization(proxy: URL): Record<string, string> {
  if (!proxy.username) {
    return {};
  }
  const credentials = `${decodeURIComponent(proxy.username)}:${decodeURIComponent(proxy.password)}`;
  return { 'proxy-authorization': `Basic ${Buffer.from(credentials).toString('base64')}` };
}

function defaultPort(url: URL): number {
  if (url.port) {
    return Number(url.port);
  }
  return url.protocol === 'https:' ? 443 : 80;
}

function abortError(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error(String(signal.reason));
}

function countSockets(sockets: NodeJS.ReadOnlyDict<unknown[]>): number {
  return Object.values(sockets).reduce((total, list) => total + (list?.length ?? 0), 0);
}

async function* readBody(
  res: http.IncomingMessage,
  signal: AbortSignal,
  release: () => void
): AsyncGenerator<Uint8Array> {
  const onAbort = () => res.destroy(abortError(signal));
  signal.addEventListener('abort', onAbort, { once: true });
  try {
    if (signal.aborted) {
      throw abortError(signal);
    }
    for await (const chunk of res) {
      yield chunk instanceof Uint8Array ? chunk : Buffer.from(String(chunk));
    }
  } catch (error) {
    throw signal.aborted ? signal.reason : error;
  } finally {
    signal.removeEventListener('abort', onAbort);
    if (!res.complete) {
      res.destroy();
    }
    release();
  }
}

// ============================================
// TRANSPORT
// ============================================

/**
 * node:http / node:https implementation of HttpTransport.
 *
 * @example
 * ```ts
 * const transport = new NodeHttpTransport({ maxSockets: 20 });
 * const response = await transport.request({
 *   url: 'https://self-signed.example.test/',
 *   method: 'GET',
 *   headers: {},
 *   timeoutMs: 30000,
 *   verifyTls: false,
 * });
 * ```
 */
export class NodeHttpTransport implements HttpTransport {
  private readonly config: Required<NodeHttpTransportConfig>;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private totalRequests = 0;

  constructor(config: NodeHttpTransportConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    const agentOptions = {
      keepAlive: true,
      keepAliveMsecs: this.config.keepAliveMs,
      maxSockets: this.config.maxSockets,
      maxTotalSockets: this.config.maxTotalSockets,
      scheduling: 'lifo' as const,
    };
    this.httpAgent = new http.Agent(agentOptions);
    this.httpsAgent = new https.Agent(agentOptions);

    log.debug('HTTP transport initialized', {
      maxSockets: this.config.maxSockets,
      maxTotalSockets: this.config.maxTotalSockets,
    });
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    this.totalRequests++;

    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new TransportTimeoutError(request.timeoutMs, request.url)),
      request.timeoutMs
    );
    const onCallerAbort = () => controller.abort(request.signal?.reason);
    if (request.signal?.aborted) {
      onCallerAbort();
    } else {
      request.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    let released = false;
    const release = () => {
      if (released) return;
      released = true;
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', onCallerAbort);
    };

    try {
      let url = new URL(request.url);
      let method = request.method.toUpperCase();

      for (let hop = 0; ; hop++) {
        const res = await this.send(url, method, request, controller.signal);
        const status = res.statusCode ?? 0;
        const location = res.headers.location;

        if (REDIRECT_STATUSES.has(status) && location) {
          res.resume();
          if (hop >= this.config.maxRedirects) {
            throw new TooManyRedirectsError(request.url, this.config.maxRedirects);
          }
          url = new URL(location, url);
          if (status === 303 || ((status === 301 || status === 302) && method === 'POST')) {
            method = 'GET';
          }
          log.debug('Following redirect', { status, url: url.toString() });
          continue;
        }

        return {
          url: url.toString(),
          status,
          headers: flattenHeaders(res.headers),
          body: readBody(res, controller.signal, release),
          discard: () => {
            if (!res.complete) {
              res.destroy();
            }
            release();
          },
        };
      }
    } catch (error) {
      release();
      throw controller.signal.aborted ? controller.signal.reason : error;
    }
  }

  getStats(): TransportStats {
    return {
      totalRequests: this.totalRequests,
      activeSockets: countSockets(this.httpAgent.sockets) + countSockets(this.httpsAgent.sockets),
      freeSockets: countSockets(this.httpAgent.freeSockets) + countSockets(this.httpsAgent.freeSockets),
    };
  }

  /**
   * Destroy all pooled connections
   */
  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
    log.debug('HTTP transport closed');
  }

  private async send(
    url: URL,
    method: string,
    request: TransportRequest,
    signal: AbortSignal
  ): Promise<http.IncomingMessage> {
    const isHttps = url.protocol === 'https:';
    if (!isHttps && url.protocol !== 'http:') {
      throw new Error(`Unsupported protocol: ${url.protocol}`);
    }

    const headers: Record<string, string> = { host: url.host, ...request.headers };
    const proxy = request.proxy ? new URL(request.proxy) : undefined;
    let tunnel: tls.TLSSocket | undefined;
    if (proxy && isHttps) {
      tunnel = await this.openTunnel(url, proxy, request.verifyTls, signal);
    }

    return new Promise<http.IncomingMessage>((resolve, reject) => {
      let req: http.ClientRequest;

      if (proxy && !isHttps) {
        req = http.request({
          method,
          host: proxy.hostname,
          port: defaultPort(proxy),
          path: url.toString(),
          headers: { ...headers, ...proxyAuthorization(proxy) },
          agent: this.httpAgent,
        });
      } else if (tunnel) {
        const socket = tunnel;
        req = https.request({
          method,
          host: url.hostname,
          port: defaultPort(url),
          path: `${url.pathname}${url.search}`,
          headers,
          agent: false,
          createConnection: () => socket,
        });
      } else if (isHttps) {
        req = https.request({
          method,
          host: url.hostname,
          port: defaultPort(url),
          path: `${url.pathname}${url.search}`,
          headers,
          agent: this.httpsAgent,
          rejectUnauthorized: request.verifyTls,
          servername: isIP(url.hostname) ? undefined : url.hostname,
        });
      } else {
        req = http.request({
          method,
          host: url.hostname,
          port: defaultPort(url),
          path: `${url.pathname}${url.search}`,
          headers,
          agent: this.httpAgent,
        });
      }

      const onAbort = () => req.destroy(abortError(signal));
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }

      req.once('response', (res) => {
        signal.removeEventListener('abort', onAbort);
        resolve(res);
      });
      req.on('error', (error) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      });
      req.end();
    });
  }

  private openTunnel(
    url: URL,
    proxy: URL,
    verifyTls: boolean,
    signal: AbortSignal
  ): Promise<tls.TLSSocket> {
    const target = `${url.hostname}:${defaultPort(url)}`;

    return new Promise<tls.TLSSocket>((resolve, reject) => {
      const connectReq = http.request({
        method: 'CONNECT',
        host: proxy.hostname,
        port: defaultPort(proxy),
        path: target,
        headers: { host: target, ...proxyAuthorization(proxy) },
        agent: false,
      });

      const onAbort = () => connectReq.destroy(abortError(signal));
      signal.addEventListener('abort', onAbort, { once: true });

      connectReq.once('connect', (res, socket) => {
        signal.removeEventListener('abort', onAbort);
        if (res.statusCode !== 200) {
          socket.destroy();
          reject(new ProxyTunnelError(proxy.host, res.statusCode, `status ${res.statusCode}`));
          return;
        }
        resolve(
          tls.connect({
            socket,
            servername: isIP(url.hostname) ? undefined : url.hostname,
            rejectUnauthorized: verifyTls,
          })
        );
      });
      connectReq.on('error', (error) => {
        signal.removeEventListener('abort', onAbort);
        reject(new ProxyTunnelError(proxy.host, undefined, error.message));
      });
      connectReq.end();
    });
  }
}
