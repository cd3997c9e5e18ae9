/**
 * Session Store - persists named cookie sets across runs
 *
 * Features:
 * - One JSON file per session: `<sessionsDir>/<name>.json`
 * - Atomic writes (temp file + rename) so a crash never leaves a half-written record
 * - Tagged results for NotFound / IOFailure instead of exceptions
 *
 * The store only hands records back. Whether a caller navigates to the
 * saved URL is up to the caller.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import type {
  SessionCookie,
  SessionDeleteResult,
  SessionDetailedListResult,
  SessionInfo,
  SessionListResult,
  SessionLoadResult,
  SessionRecord,
  SessionSaveResult,
} from '../types/session.js';

const log = logger.session;

const SESSION_FILE_EXT = '.json';
const TEMP_FILE_EXT = '.tmp';
const SESSION_NAME_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

// ============================================
// ERRORS
// ============================================

export type SessionStoreErrorKind = 'NotFound' | 'IOFailure';

export class SessionStoreError extends Error {
  constructor(
    public readonly kind: SessionStoreErrorKind,
    public readonly sessionName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SessionStoreError';
  }
}

// ============================================
// FILE SCHEMA
// ============================================

const sessionCookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string().optional(),
  expires: z.number().optional(),
  httpOnly: z.boolean().optional(),
  secure: z.boolean().optional(),
  sameSite: z.enum(['Strict', 'Lax', 'None']).optional(),
});

const sessionRecordSchema = z
  .object({
    name: z.string(),
    saved_at: z.string(),
    cookies: z.array(sessionCookieSchema),
    cookie_count: z.number().int().nonnegative(),
    domains: z.array(z.string()),
    current_url: z.string().nullish(),
  })
  .transform(({ current_url, ...rest }): SessionRecord =>
    current_url == null ? rest : { ...rest, current_url }
  );

// ============================================
// HELPERS
// ============================================

export function isValidSessionName(name: string): boolean {
  return SESSION_NAME_PATTERN.test(name) && name !== '.' && name !== '..';
}

function assertValidName(name: string): void {
  if (!isValidSessionName(name)) {
    throw new SessionStoreError(
      'IOFailure',
      name,
      `Invalid session name "${name}": use 1-128 letters, digits, '.', '_' or '-'`
    );
  }
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function copyCookies(cookies: readonly SessionCookie[]): SessionCookie[] {
  return cookies.map((cookie) => ({ ...cookie }));
}

export function distinctDomains(cookies: readonly SessionCookie[]): string[] {
  return [...new Set(cookies.map((cookie) => cookie.domain))];
}

export function toSessionInfo(record: SessionRecord): SessionInfo {
  return {
    name: record.name,
    cookieCount: record.cookie_count,
    domains: [...record.domains],
    ...(record.current_url !== undefined && { currentUrl: record.current_url }),
    savedAt: record.saved_at,
  };
}

// ============================================
// STORE
// ============================================

export class SessionStore {
  private readonly now: () => Date;

  constructor(
    private readonly sessionsDir: string = './sessions',
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async initialize(): Promise<void> {
    await fs.mkdir(this.sessionsDir, { recursive: true });
  }

  getDirectory(): string {
    return this.sessionsDir;
  }

  /**
   * @throws SessionStoreError for names that cannot map to a file
   */
  pathFor(name: string): string {
    assertValidName(name);
    return path.join(this.sessionsDir, `${name}${SESSION_FILE_EXT}`);
  }

  /**
   * Save (or overwrite) the named session
   */
  async save(
    cookies: readonly SessionCookie[],
    currentUrl: string | undefined,
    name: string
  ): Promise<SessionSaveResult> {
    const stored = copyCookies(cookies);
    const record: SessionRecord = {
      name,
      saved_at: this.now().toISOString(),
      cookies: stored,
      cookie_count: stored.length,
      domains: distinctDomains(stored),
      ...(currentUrl !== undefined && { current_url: currentUrl }),
    };

    try {
      const filePath = this.pathFor(name);
      await fs.mkdir(this.sessionsDir, { recursive: true });
      await this.atomicWrite(filePath, JSON.stringify(record, null, 2));
      log.info('Session saved', {
        sessionName: name,
        cookieCount: record.cookie_count,
        domains: record.domains,
      });
      return { saved: true, path: filePath, record: { ...record, cookies: copyCookies(stored) } };
    } catch (error) {
      log.error('Failed to save session', { sessionName: name, error });
      return { saved: false, kind: 'IOFailure', name, error: errorMessage(error) };
    }
  }

  /**
   * Load the named session. A missing record is NotFound, an unreadable
   * or malformed one is IOFailure.
   */
  async load(name: string): Promise<SessionLoadResult> {
    let raw: string;
    try {
      raw = await fs.readFile(this.pathFor(name), 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        log.debug('Session not found', { sessionName: name });
        return { found: false, kind: 'NotFound', name };
      }
      log.error('Failed to read session', { sessionName: name, error });
      return { found: false, kind: 'IOFailure', name, error: errorMessage(error) };
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      log.error('Session file is not valid JSON', { sessionName: name, error });
      return { found: false, kind: 'IOFailure', name, error: `Corrupt session file: ${errorMessage(error)}` };
    }

    const parsed = sessionRecordSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      return {
        found: false,
        kind: 'IOFailure',
        name,
        error: `Malformed session file: ${issues.join('; ')}`,
      };
    }

    log.debug('Session loaded', { sessionName: name, cookieCount: parsed.data.cookie_count });
    return { found: true, record: parsed.data };
  }

  /**
   * Names of all stored sessions, sorted. A missing directory lists as empty.
   */
  async list(): Promise<SessionListResult> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.sessionsDir);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return { ok: true, names: [] };
      }
      log.error('Failed to list sessions', { sessionsDir: this.sessionsDir, error });
      return { ok: false, kind: 'IOFailure', error: errorMessage(error) };
    }

    const names = entries
      .filter((entry) => entry.endsWith(SESSION_FILE_EXT))
      .map((entry) => entry.slice(0, -SESSION_FILE_EXT.length))
      .filter(isValidSessionName)
      .sort();
    return { ok: true, names };
  }

  /**
   * Invalid names report NotFound: no record can exist under them.
   */
  async delete(name: string): Promise<SessionDeleteResult> {
    if (!isValidSessionName(name)) {
      return { deleted: false, kind: 'NotFound', name };
    }
    try {
      await fs.unlink(this.pathFor(name));
      log.info('Session deleted', { sessionName: name });
      return { deleted: true, name };
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return { deleted: false, kind: 'NotFound', name };
      }
      log.error('Failed to delete session', { sessionName: name, error });
      return { deleted: false, kind: 'IOFailure', name, error: errorMessage(error) };
    }
  }

  /**
   * Summary of one session, or undefined when it does not load
   */
  async describe(name: string): Promise<SessionInfo | undefined> {
    const result = await this.load(name);
    return result.found ? toSessionInfo(result.record) : undefined;
  }

  /**
   * Summaries of every session that loads; unreadable files are skipped
   */
  async listDetailed(): Promise<SessionDetailedListResult> {
    const listed = await this.list();
    if (!listed.ok) {
      return listed;
    }

    const sessions: SessionInfo[] = [];
    for (const name of listed.names) {
      const info = await this.describe(name);
      if (info) {
        sessions.push(info);
      } else {
        log.warn('Skipping unreadable session', { sessionName: name });
      }
    }
    return { ok: true, sessions };
  }

  private async atomicWrite(filePath: string, content: string): Promise<void> {
    const tempPath = `${filePath}.${randomUUID()}${TEMP_FILE_EXT}`;
    try {
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.unlink(tempPath).catch((cleanupError: unknown) =>
        log.debug('Temp session cleanup skipped', { path: tempPath, error: errorMessage(cleanupError) })
      );
      throw error;
    }
  }
}
