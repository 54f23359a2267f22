import { describe, expect, it } from 'vitest';
import { assertOwns, hashPassword, OwnershipError, verifyPassword } from './auth.js';
import type { Goal, User } from '../../src/domain/types.js';

const alice: User = {
  id: 1,
  name: 'Alice',
  username: 'alice',
  passwordHash: '',
  currency: 'UAH',
  created: '2024-01-01',
};

const goal: Goal = { id: 7, userId: 1, name: 'Bike', target: 500, current: 0, deadline: null };

describe('passwords', () => {
  it('verifies the password it hashed', () => {
    const stored = hashPassword('test-password');
    expect(stored.startsWith('scrypt$')).toBe(true);
    expect(verifyPassword('test-password', stored)).toBe(true);
    expect(verifyPassword('wrong-password', stored)).toBe(false);
  });

  it('salts every hash', () => {
    expect(hashPassword('same')).not.toBe(hashPassword('same'));
  });

  it('rejects malformed stored values', () => {
    expect(verifyPassword('x', 'plaintext')).toBe(false);
    expect(verifyPassword('x', 'scrypt$00$00')).toBe(false);
  });
});

describe('assertOwns', () => {
  it('returns rows owned by the user', () => {
    expect(assertOwns(goal, alice)).toBe(goal);
  });

  it('throws for missing rows and rows of other users', () => {
    expect(() => assertOwns(undefined, alice, 'Goal')).toThrow(OwnershipError);
    expect(() => assertOwns({ ...goal, userId: 2 }, alice, 'Goal')).toThrow('Goal not found');
  });
});
