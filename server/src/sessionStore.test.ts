import { beforeEach, describe, expect, it } from 'vitest';
import session from 'express-session';
import { openDatabase, type Db } from './db.js';
import { SqliteSessionStore } from './sessionStore.js';

const HOUR = 60 * 60 * 1000;

let db: Db;
let clock: number;
let store: SqliteSessionStore;

beforeEach(() => {
  db = openDatabase(':memory:');
  clock = Date.UTC(2024, 4, 1);
  store = new SqliteSessionStore(db, { ttlMs: HOUR, now: () => clock });
});

function makeSession(userId: number, expires?: number): session.SessionData {
  const cookie = new session.Cookie();
  if (expires !== undefined) cookie.expires = new Date(expires);
  return { cookie, userId, flash: [] };
}

function load(sid: string): Promise<session.SessionData | null | undefined> {
  return new Promise((resolve, reject) => {
    store.get(sid, (err, sess) => (err ? reject(err) : resolve(sess)));
  });
}

function save(sid: string, sess: session.SessionData): Promise<void> {
  return new Promise((resolve, reject) => {
    store.set(sid, sess, (err) => (err ? reject(err) : resolve()));
  });
}

function sessionCount(): number {
  return db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM sessions').get()?.n ?? -1;
}

describe('SqliteSessionStore', () => {
  it('returns what was saved', async () => {
    await save('a', makeSession(7));
    expect(await load('a')).toMatchObject({ userId: 7, flash: [] });
  });

  it('answers null for an unknown id', async () => {
    expect(await load('missing')).toBeNull();
  });

  it('replaces a session saved twice under one id', async () => {
    await save('a', makeSession(1));
    await save('a', makeSession(2));
    expect(await load('a')).toMatchObject({ userId: 2 });
    expect(sessionCount()).toBe(1);
  });

  it('expires a session after the ttl when the cookie has no expiry', async () => {
    await save('a', makeSession(1));
    clock += HOUR;
    expect(await load('a')).toBeNull();
  });

  it('follows the cookie expiry when there is one', async () => {
    await save('a', makeSession(1, clock + 3 * HOUR));
    clock += 2 * HOUR;
    expect(await load('a')).toMatchObject({ userId: 1 });
  });

  it('deletes expired rows on the next write', async () => {
    await save('old', makeSession(1));
    clock += 2 * HOUR;
    await save('new', makeSession(2));
    expect(sessionCount()).toBe(1);
    expect(await load('new')).toMatchObject({ userId: 2 });
  });

  it('extends the expiry on touch', async () => {
    const sess = makeSession(1);
    await save('a', sess);
    clock += HOUR / 2;
    await new Promise<void>((resolve, reject) => {
      store.touch('a', sess, (err) => (err ? reject(err) : resolve()));
    });
    clock += HOUR / 2;
    expect(await load('a')).toMatchObject({ userId: 1 });
  });

  it('forgets a destroyed session', async () => {
    await save('a', makeSession(1));
    await new Promise<void>((resolve, reject) => {
      store.destroy('a', (err) => (err ? reject(err) : resolve()));
    });
    expect(await load('a')).toBeNull();
  });

  it('hands driver errors to the callback', async () => {
    db.close();
    await expect(load('a')).rejects.toThrow();
  });
});
