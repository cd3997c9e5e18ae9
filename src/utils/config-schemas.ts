/**
 * Configuration Schemas
 *
 * Zod schemas for every configuration section. Inputs arrive as raw
 * environment strings or as typed overrides; both pass through the same
 * coercion so a value means the same thing whichever way it came in.
 */

import { z } from 'zod';
import { TIMEOUTS } from './timeouts.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

// ============================================
// HELPER SCHEMAS
// ============================================

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

/**
 * Boolean from 'true' / '1' / 'yes' (case-insensitive); other strings are false.
 */
export function booleanFlagSchema(defaultValue: boolean) {
  return z.preprocess((value) => {
    const normalized = blankToUndefined(value);
    if (normalized === undefined) return defaultValue;
    if (typeof normalized === 'string') {
      return ['true', '1', 'yes'].includes(normalized.toLowerCase());
    }
    return normalized;
  }, z.boolean());
}

/**
 * Bounded integer, coerced from strings.
 */
export function integerSchema(options: { min: number; max: number; default: number }) {
  return z.preprocess(
    (value) => blankToUndefined(value) ?? options.default,
    z.coerce.number().int().min(options.min).max(options.max)
  );
}

export function stringWithDefault(defaultValue: string) {
  return z.preprocess((value) => blankToUndefined(value) ?? defaultValue, z.string().min(1));
}

/**
 * Optional proxy endpoint; must be an http(s) URL when set.
 */
export const optionalProxySchema = z.preprocess(
  blankToUndefined,
  z
    .string()
    .url()
    .refine((url) => url.startsWith('http://') || url.startsWith('https://'), {
      message: 'Proxy must be an http:// or https:// URL',
    })
    .optional()
);

export const logLevelSchema = z.preprocess(
  blankToUndefined,
  z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')
);

// ============================================
// SECTIONS
// ============================================

export const logConfigSchema = z.object({
  level: logLevelSchema,
  prettyPrint: booleanFlagSchema(false),
});

export type LogConfig = z.infer<typeof logConfigSchema>;

export const fetchConfigSchema = z.object({
  /** Total attempts, including the first */
  maxRetries: integerSchema({ min: 1, max: 10, default: 3 }),
  retryDelayMs: integerSchema({ min: 0, max: 60000, default: TIMEOUTS.RETRY_BASE_DELAY }),
  timeoutMs: integerSchema({ min: 100, max: 600000, default: TIMEOUTS.NETWORK_FETCH }),
  proxy: optionalProxySchema,
  verifyTls: booleanFlagSchema(false),
  userAgent: stringWithDefault(DEFAULT_USER_AGENT),
  downloadsDir: stringWithDefault('./downloads'),
});

export type FetchConfig = z.infer<typeof fetchConfigSchema>;

export const sessionConfigSchema = z.object({
  sessionsDir: stringWithDefault('./sessions'),
});

export type SessionConfig = z.infer<typeof sessionConfigSchema>;

export const networkConfigSchema = z.object({
  maxEvents: integerSchema({ min: 1, max: 1_000_000, default: 10000 }),
  summarySize: integerSchema({ min: 1, max: 1000, default: 10 }),
  /** Also record fetch-engine attempts, not only browser traffic */
  recordFetches: booleanFlagSchema(false),
});

export type NetworkConfig = z.infer<typeof networkConfigSchema>;

export const browserConfigSchema = z.object({
  headless: booleanFlagSchema(true),
  proxy: optionalProxySchema,
  navigationTimeoutMs: integerSchema({ min: 1000, max: 300000, default: TIMEOUTS.PAGE_LOAD }),
});

export type BrowserConfig = z.infer<typeof browserConfigSchema>;

export const bridgeConfigSchema = z.object({
  log: logConfigSchema,
  fetch: fetchConfigSchema,
  session: sessionConfigSchema,
  network: networkConfigSchema,
  browser: browserConfigSchema,
});

export type BridgeConfig = z.infer<typeof bridgeConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

export function formatConfigErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
}

export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    super(
      `Configuration validation failed for ${section}:\n${formatConfigErrors(zodError)}\n\n` +
        'Please check your environment variables.'
    );
    this.name = 'ConfigValidationError';
  }
}
