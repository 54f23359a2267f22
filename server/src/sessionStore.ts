/**
 * express-session store kept in the ledger database, so sessions survive a
 * restart and the table stays bounded: expired rows are never returned and
 * are deleted on every write.
 */
import session from 'express-session';
import type { Db } from './db.js';

export const SESSION_TTL_MS = 24 * 60 * 60 * 1000;

interface SessionRow {
  sess: string;
}

export interface SessionStoreOptions {
  /** Lifetime of a session whose cookie has no expiry of its own */
  ttlMs?: number;
  now?: () => number;
}

function prepareStatements(db: Db) {
  return {
    live: db.prepare<[string, number], SessionRow>(
      'SELECT sess FROM sessions WHERE sid = ? AND expires > ?',
    ),
    upsert: db.prepare<[string, string, number]>(`
      INSERT INTO sessions (sid, sess, expires) VALUES (?, ?, ?)
      ON CONFLICT(sid) DO UPDATE SET sess = excluded.sess, expires = excluded.expires
    `),
    touch: db.prepare<[number, string]>('UPDATE sessions SET expires = ? WHERE sid = ?'),
    destroy: db.prepare<[string]>('DELETE FROM sessions WHERE sid = ?'),
    prune: db.prepare<[number]>('DELETE FROM sessions WHERE expires <= ?'),
  };
}

export class SqliteSessionStore extends session.Store {
  private readonly stmts: ReturnType<typeof prepareStatements>;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(db: Db, options: SessionStoreOptions = {}) {
    super();
    this.stmts = prepareStatements(db);
    this.ttlMs = options.ttlMs ?? SESSION_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  private expiryOf(sess: session.SessionData, now: number): number {
    const expires = sess.cookie.expires;
    return expires ? new Date(expires).getTime() : now + this.ttlMs;
  }

  get(sid: string, callback: (err: unknown, sess?: session.SessionData | null) => void): void {
    let sess: session.SessionData | null;
    try {
      const row = this.stmts.live.get(sid, this.now());
      sess = row ? JSON.parse(row.sess) : null;
    } catch (error) {
      callback(error);
      return;
    }
    callback(null, sess);
  }

  set(sid: string, sess: session.SessionData, callback?: (err?: unknown) => void): void {
    try {
      const now = this.now();
      this.stmts.prune.run(now);
      this.stmts.upsert.run(sid, JSON.stringify(sess), this.expiryOf(sess, now));
    } catch (error) {
      callback?.(error);
      return;
    }
    callback?.();
  }

  /** Pushes the expiry forward for an unmodified session still in use */
  touch(sid: string, sess: session.SessionData, callback?: (err?: unknown) => void): void {
    try {
      this.stmts.touch.run(this.expiryOf(sess, this.now()), sid);
    } catch (error) {
      callback?.(error);
      return;
    }
    callback?.();
  }

  destroy(sid: string, callback?: (err?: unknown) => void): void {
    try {
      this.stmts.destroy.run(sid);
    } catch (error) {
      callback?.(error);
      return;
    }
    callback?.();
  }
}
