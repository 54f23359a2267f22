import type { Request, RequestHandler, Response } from 'express';
import { randomBytes, scryptSync, timingSafeEqual } from 'crypto';
import type { Repository } from './repo.js';
import type { FlashMessage, Owned, User } from '../../src/domain/types.js';

declare module 'express-session' {
  interface SessionData {
    userId: number;
    flash: FlashMessage[];
  }
}

const KEY_LENGTH = 64;

// --- Passwords ---

/** `scrypt$<salt hex>$<hash hex>` */
export function hashPassword(password: string): string {
  const salt = randomBytes(16);
  const hash = scryptSync(password, salt, KEY_LENGTH);
  return `scrypt$${salt.toString('hex')}$${hash.toString('hex')}`;
}

export function verifyPassword(password: string, stored: string): boolean {
  const [scheme, saltHex, hashHex] = stored.split('$');
  if (scheme !== 'scrypt' || !saltHex || !hashHex) return false;

  const expected = Buffer.from(hashHex, 'hex');
  if (expected.length !== KEY_LENGTH) return false;

  const actual = scryptSync(password, Buffer.from(saltHex, 'hex'), KEY_LENGTH);
  return timingSafeEqual(actual, expected);
}

// --- Session identity ---

/** The logged-in user for this request, if the session still points at one */
export function sessionUser(req: Request, repo: Repository): User | undefined {
  const { userId } = req.session;
  return userId === undefined ? undefined : repo.findUserById(userId);
}

export type AuthedHandler = (req: Request, res: Response, user: User) => void;

interface WithUserOptions {
  /** Respond to anonymous requests; defaults to redirecting to the login page */
  onAnonymous?: (req: Request, res: Response) => void;
}

/**
 * Resolve the session to a user and hand it to the handler.
 * Anonymous requests never reach the handler.
 */
export function withUser(
  repo: Repository,
  handler: AuthedHandler,
  options: WithUserOptions = {},
): RequestHandler {
  return (req, res) => {
    const user = sessionUser(req, repo);
    if (!user) {
      if (options.onAnonymous) {
        options.onAnonymous(req, res);
      } else {
        res.redirect('/');
      }
      return;
    }
    handler(req, res, user);
  };
}

// --- Ownership ---

export class OwnershipError extends Error {
  constructor(what: string) {
    super(`${what} not found`);
    this.name = 'OwnershipError';
  }
}

/**
 * Narrow a looked-up row to one owned by `user`.
 * Missing rows and rows of other users are indistinguishable to the caller.
 */
export function assertOwns<T extends Owned>(row: T | undefined, user: User, what = 'Record'): T {
  if (!row || row.userId !== user.id) {
    throw new OwnershipError(what);
  }
  return row;
}
