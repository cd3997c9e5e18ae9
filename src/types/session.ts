/**
 * Session Record Types
 *
 * Mirrors the on-disk session file format (snake_case keys are part of
 * the file contract).
 */

export type SameSite = 'Strict' | 'Lax' | 'None';

export interface SessionCookie {
  name: string;
  value: string;
  domain: string;
  path?: string;
  /** Unix seconds, -1 for session cookies */
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
  sameSite?: SameSite;
}

export interface SessionRecord {
  name: string;
  saved_at: string;
  cookies: SessionCookie[];
  cookie_count: number;
  domains: string[];
  current_url?: string;
}

export interface SessionInfo {
  name: string;
  cookieCount: number;
  domains: string[];
  currentUrl?: string;
  savedAt: string;
}

export type SessionLoadResult =
  | { found: true; record: SessionRecord }
  | { found: false; kind: 'NotFound'; name: string }
  | { found: false; kind: 'IOFailure'; name: string; error: string };

export type SessionSaveResult =
  | { saved: true; path: string; record: SessionRecord }
  | { saved: false; kind: 'IOFailure'; name: string; error: string };

export type SessionListResult =
  | { ok: true; names: string[] }
  | { ok: false; kind: 'IOFailure'; error: string };

export type SessionDetailedListResult =
  | { ok: true; sessions: SessionInfo[] }
  | { ok: false; kind: 'IOFailure'; error: string };

export type SessionDeleteResult =
  | { deleted: true; name: string }
  | { deleted: false; kind: 'NotFound'; name: string }
  | { deleted: false; kind: 'IOFailure'; name: string; error: string };
