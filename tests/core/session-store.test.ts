/**
 * Tests for SessionStore - named cookie sets on disk
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  SessionStore,
  SessionStoreError,
  distinctDomains,
  isValidSessionName,
} from '../../src/core/session-store.js';
import type { SessionCookie } from '../../src/types/session.js';

const SAVED_AT = new Date('2024-05-01T12:00:00.000Z');

describe('SessionStore', () => {
  let testDir: string;
  let store: SessionStore;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'session-store-test-'));
    store = new SessionStore(testDir, { now: () => SAVED_AT });
    await store.initialize();
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  // ============================================
  // SAVE / LOAD
  // ============================================

  describe('save and load', () => {
    it('should round-trip a single cookie', async () => {
      const saved = await store.save(
        [{ domain: 'example.com', name: 'x', value: '1' }],
        'https://example.com',
        's1'
      );
      expect(saved).toMatchObject({ saved: true, path: path.join(testDir, 's1.json') });

      const loaded = await store.load('s1');

      expect(loaded).toEqual({
        found: true,
        record: {
          name: 's1',
          saved_at: SAVED_AT.toISOString(),
          cookies: [{ domain: 'example.com', name: 'x', value: '1' }],
          cookie_count: 1,
          domains: ['example.com'],
          current_url: 'https://example.com',
        },
      });
    });

    it('should write the documented file format', async () => {
      await store.save([{ domain: '.shop.test', name: 'sid', value: 'test-secret', path: '/' }], undefined, 'shop');

      const onDisk = JSON.parse(await fs.readFile(path.join(testDir, 'shop.json'), 'utf-8'));

      expect(onDisk).toEqual({
        name: 'shop',
        saved_at: SAVED_AT.toISOString(),
        cookies: [{ domain: '.shop.test', name: 'sid', value: 'test-secret', path: '/' }],
        cookie_count: 1,
        domains: ['.shop.test'],
      });
    });

    it('should deduplicate domains', async () => {
      const cookies: SessionCookie[] = [
        { domain: 'a.test', name: 'one', value: '1' },
        { domain: 'b.test', name: 'two', value: '2' },
        { domain: 'a.test', name: 'three', value: '3' },
      ];

      const saved = await store.save(cookies, undefined, 'multi');

      expect(saved.saved && [...saved.record.domains].sort()).toEqual(['a.test', 'b.test']);
      expect(saved.saved && saved.record.cookie_count).toBe(3);
    });

    it('should overwrite an existing record of the same name', async () => {
      await store.save([{ domain: 'a.test', name: 'old', value: '1' }], undefined, 'same');
      await store.save([], 'https://b.test/', 'same');

      const loaded = await store.load('same');

      expect(loaded.found && loaded.record.cookie_count).toBe(0);
      expect(loaded.found && loaded.record.current_url).toBe('https://b.test/');
    });

    it('should copy cookies rather than keep the caller array', async () => {
      const cookies: SessionCookie[] = [{ domain: 'a.test', name: 'n', value: 'before' }];
      const saved = await store.save(cookies, undefined, 'copy');
      cookies[0].value = 'after';

      expect(saved.saved && saved.record.cookies[0].value).toBe('before');
    });

    it('should keep the stored cookie_count on load', async () => {
      await fs.writeFile(
        path.join(testDir, 'manual.json'),
        JSON.stringify({
          name: 'manual',
          saved_at: SAVED_AT.toISOString(),
          cookies: [{ domain: 'a.test', name: 'n', value: 'v' }],
          cookie_count: 1,
          domains: ['a.test'],
          current_url: null,
        })
      );

      const loaded = await store.load('manual');

      expect(loaded.found).toBe(true);
      if (loaded.found) {
        expect(loaded.record.cookie_count).toBe(1);
        expect('current_url' in loaded.record).toBe(false);
      }
    });
  });

  // ============================================
  // FAILURES
  // ============================================

  describe('failures', () => {
    it('should return NotFound for a missing session', async () => {
      expect(await store.load('nonexistent')).toEqual({ found: false, kind: 'NotFound', name: 'nonexistent' });
    });

    it('should return IOFailure for a corrupt file', async () => {
      await fs.writeFile(path.join(testDir, 'broken.json'), '{not json');

      const loaded = await store.load('broken');

      expect(loaded.found).toBe(false);
      expect(!loaded.found && loaded.kind).toBe('IOFailure');
    });

    it('should return IOFailure for a file missing required fields', async () => {
      await fs.writeFile(path.join(testDir, 'partial.json'), JSON.stringify({ name: 'partial' }));

      const loaded = await store.load('partial');

      expect(loaded).toMatchObject({ found: false, kind: 'IOFailure', name: 'partial' });
    });

    it('should refuse names that do not map to a single file', async () => {
      const saved = await store.save([], undefined, '../escape');

      expect(saved).toMatchObject({ saved: false, kind: 'IOFailure', name: '../escape' });
      expect(await store.load('../escape')).toMatchObject({ found: false, kind: 'IOFailure' });
      expect(() => store.pathFor('..')).toThrow(SessionStoreError);
    });
  });

  // ============================================
  // LIST / DELETE / DESCRIBE
  // ============================================

  describe('list, delete and describe', () => {
    it('should list sessions by name and ignore other files', async () => {
      await store.save([], undefined, 'beta');
      await store.save([], undefined, 'alpha');
      await fs.writeFile(path.join(testDir, 'notes.txt'), 'ignored');
      await fs.writeFile(path.join(testDir, 'gamma.json.1234.tmp'), '{}');

      expect(await store.list()).toEqual({ ok: true, names: ['alpha', 'beta'] });
    });

    it('should list nothing when the directory is missing', async () => {
      const missing = new SessionStore(path.join(testDir, 'nowhere'));

      expect(await missing.list()).toEqual({ ok: true, names: [] });
    });

    it('should report whether delete removed anything', async () => {
      await store.save([], undefined, 'temp');

      expect(await store.delete('temp')).toEqual({ deleted: true, name: 'temp' });
      expect(await store.delete('temp')).toEqual({ deleted: false, kind: 'NotFound', name: 'temp' });
      expect(await store.delete('nonexistent')).toEqual({ deleted: false, kind: 'NotFound', name: 'nonexistent' });
      expect(await store.delete('../escape')).toEqual({ deleted: false, kind: 'NotFound', name: '../escape' });
      expect(await store.load('temp')).toMatchObject({ found: false, kind: 'NotFound' });
    });

    it('should describe sessions', async () => {
      await store.save(
        [
          { domain: 'a.test', name: 'one', value: '1' },
          { domain: 'b.test', name: 'two', value: '2' },
        ],
        'https://a.test/home',
        'described'
      );

      expect(await store.describe('described')).toEqual({
        name: 'described',
        cookieCount: 2,
        domains: ['a.test', 'b.test'],
        currentUrl: 'https://a.test/home',
        savedAt: SAVED_AT.toISOString(),
      });
      expect(await store.describe('nonexistent')).toBeUndefined();
    });

    it('should skip unreadable files in the detailed listing', async () => {
      await store.save([], undefined, 'good');
      await fs.writeFile(path.join(testDir, 'bad.json'), 'nope');

      const detailed = await store.listDetailed();

      expect(detailed.ok && detailed.sessions.map((info) => info.name)).toEqual(['good']);
    });

    it('should report IOFailure when the sessions path is a regular file', async () => {
      const filePath = path.join(testDir, 'not-a-dir');
      await fs.writeFile(filePath, 'plain file');
      const broken = new SessionStore(filePath);

      const listed = await broken.list();
      const detailed = await broken.listDetailed();
      const deleted = await broken.delete('work');

      expect(listed).toMatchObject({ ok: false, kind: 'IOFailure' });
      expect(!listed.ok && listed.error).toMatch(/^ENOTDIR/);
      expect(detailed).toEqual(listed);
      expect(deleted).toMatchObject({ deleted: false, kind: 'IOFailure', name: 'work' });
      expect(!deleted.deleted && deleted.kind === 'IOFailure' && deleted.error).toMatch(/^ENOTDIR/);
    });
  });
});

describe('session helpers', () => {
  it('should validate session names', () => {
    expect(isValidSessionName('work-2024.v1_a')).toBe(true);
    expect(isValidSessionName('')).toBe(false);
    expect(isValidSessionName('.')).toBe(false);
    expect(isValidSessionName('a/b')).toBe(false);
    expect(isValidSessionName('x'.repeat(129))).toBe(false);
  });

  it('should keep first-seen domain order', () => {
    expect(
      distinctDomains([
        { domain: 'b.test', name: '1', value: '' },
        { domain: 'a.test', name: '2', value: '' },
        { domain: 'b.test', name: '3', value: '' },
      ])
    ).toEqual(['b.test', 'a.test']);
  });
});
