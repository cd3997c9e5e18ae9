/**
 * Environment Variable Parser
 *
 * Maps environment variables onto the configuration sections and
 * validates the result. Explicit overrides win over the environment.
 */

import {
  bridgeConfigSchema,
  ConfigValidationError,
  type BridgeConfig,
  type BrowserConfig,
  type FetchConfig,
  type LogConfig,
  type NetworkConfig,
  type SessionConfig,
} from './config-schemas.js';

type Env = Record<string, string | undefined>;

export interface BridgeConfigOverrides {
  log?: Partial<LogConfig>;
  fetch?: Partial<FetchConfig>;
  session?: Partial<SessionConfig>;
  network?: Partial<NetworkConfig>;
  browser?: Partial<BrowserConfig>;
}

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig(env: Env) {
  return {
    level: env.LOG_LEVEL,
    prettyPrint: env.LOG_PRETTY,
  };
}

function mapEnvToFetchConfig(env: Env) {
  return {
    maxRetries: env.FETCH_MAX_RETRIES,
    retryDelayMs: env.FETCH_RETRY_DELAY_MS,
    timeoutMs: env.FETCH_TIMEOUT_MS,
    proxy: env.FETCH_PROXY,
    verifyTls: env.FETCH_VERIFY_TLS,
    userAgent: env.FETCH_USER_AGENT,
    downloadsDir: env.DOWNLOADS_DIR,
  };
}

function mapEnvToSessionConfig(env: Env) {
  return {
    sessionsDir: env.SESSIONS_DIR,
  };
}

function mapEnvToNetworkConfig(env: Env) {
  return {
    maxEvents: env.NETWORK_MAX_EVENTS,
    summarySize: env.NETWORK_SUMMARY_SIZE,
    recordFetches: env.NETWORK_RECORD_FETCHES,
  };
}

function mapEnvToBrowserConfig(env: Env) {
  return {
    headless: env.BROWSER_HEADLESS,
    proxy: env.BROWSER_PROXY,
    navigationTimeoutMs: env.BROWSER_NAVIGATION_TIMEOUT_MS,
  };
}

/**
 * Overlay overrides on the environment values, skipping undefined ones
 * so an absent override never masks the environment.
 */
function withOverrides(fromEnv: Record<string, unknown>, overrides: object = {}): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...fromEnv };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Parse and validate the full configuration.
 *
 * @throws ConfigValidationError listing every invalid field
 */
export function loadConfig(
  overrides: BridgeConfigOverrides = {},
  env: Env = process.env
): BridgeConfig {
  const raw = {
    log: withOverrides(mapEnvToLogConfig(env), overrides.log),
    fetch: withOverrides(mapEnvToFetchConfig(env), overrides.fetch),
    session: withOverrides(mapEnvToSessionConfig(env), overrides.session),
    network: withOverrides(mapEnvToNetworkConfig(env), overrides.network),
    browser: withOverrides(mapEnvToBrowserConfig(env), overrides.browser),
  };

  const result = bridgeConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError('bridge', result.error);
  }
  return result.data;
}
