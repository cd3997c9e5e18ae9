/**
 * lenient-web-bridge
 *
 * Retrying fetch/download engine with classified failures, concurrent
 * batch fetching, a cookie session store, and a network recorder that
 * exports HAR traces. Tool calls from an LLM bridge enter through
 * handleToolCall(); how those calls are transported is up to the host.
 *
 * @example
 * ```ts
 * import { BridgeRuntime, loadConfig, handleToolCall } from 'lenient-web-bridge';
 *
 * const runtime = new BridgeRuntime(loadConfig());
 * await runtime.initialize();
 * const response = await handleToolCall('fetch_url', { url: 'https://localhost:8443/' }, runtime);
 * await runtime.shutdown();
 * ```
 */

export type * from './types/index.js';

// Core
export {
  classifyError,
  describeKind,
  httpStatusFailure,
  isRetryable,
  parseFailure,
  FetchCancelledError,
  ProxyTunnelError,
  TooManyRedirectsError,
  TransportTimeoutError,
  type ClassifiedError,
} from './core/error-taxonomy.js';
export {
  RetryingFetchEngine,
  decodeBody,
  DOWNLOAD_CHUNK_SIZE,
  type AttemptEvent,
  type AttemptListener,
  type FetchEngineDeps,
  type FetchEngineStats,
} from './core/fetch-engine.js';
export { batchFetch, summarizeBatch, type BatchSummary } from './core/batch-coordinator.js';
export {
  SessionStore,
  SessionStoreError,
  isValidSessionName,
  type SessionStoreErrorKind,
} from './core/session-store.js';
export { NetworkRecorder, type NetworkRecorderOptions } from './core/network-recorder.js';
export {
  BrowserSession,
  captureCookies,
  restoreCookies,
  type BrowserLoadResult,
  type BrowserSessionOptions,
  type NavigationResult,
} from './core/browser-session.js';

// Runtime and tools
export { BridgeRuntime, type BridgeRuntimeDeps, type BrowserSessionFactory } from './runtime.js';
export { dispatchTool, handleToolCall } from './tools/tool-dispatch.js';
export {
  parseToolCall,
  TOOL_DESCRIPTIONS,
  TOOL_NAMES,
  type ParseToolCallResult,
  type ToolCall,
  type ToolName,
} from './tools/tool-schemas.js';
export type { ToolResponse } from './tools/response-formatters.js';

// Ambient
export { loadConfig, type BridgeConfigOverrides } from './utils/env-parser.js';
export { ConfigValidationError, type BridgeConfig } from './utils/config-schemas.js';
export { configureLogger, logger } from './utils/logger.js';
export { NodeHttpTransport, type HttpTransport, type TransportRequest, type TransportResponse } from './utils/http-transport.js';
export { LoggingProgressReporter, type DownloadProgress, type DownloadProgressReporter } from './utils/download-progress.js';
