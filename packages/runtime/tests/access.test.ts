import { describe, expect, it } from 'vitest';
import { AuthenticationRequired, PermissionDenied } from '../errors.js';
import { authorize, canAccess, type Action } from '../policy/access.js';
import { alice, anonymous, bob, staff } from './helpers.js';

const post = { type: 'post' } as const;
const aliceComment = { type: 'comment', authorId: alice.id } as const;

describe('post access', () => {
  it.each<Action>(['list', 'retrieve', 'get'])('permits %s for every caller', action => {
    for (const caller of [anonymous, alice, staff]) {
      expect(canAccess(caller, post, action)).toBe(true);
    }
  });

  it('lets any authenticated caller create', () => {
    expect(canAccess(anonymous, post, 'create')).toBe(false);
    expect(canAccess(alice, post, 'create')).toBe(true);
    expect(canAccess(staff, post, 'create')).toBe(true);
  });

  it('restricts update and delete to staff', () => {
    for (const action of ['update', 'delete'] as const) {
      expect(canAccess(anonymous, post, action)).toBe(false);
      expect(canAccess(alice, post, action)).toBe(false);
      expect(canAccess(staff, post, action)).toBe(true);
    }
  });
});

describe('comment access', () => {
  it('lets any authenticated caller create', () => {
    expect(canAccess(anonymous, { type: 'comment' }, 'create')).toBe(false);
    expect(canAccess(bob, { type: 'comment' }, 'create')).toBe(true);
  });

  it.each<Action>(['retrieve', 'get', 'update', 'delete'])('allows %s for the author and staff only', action => {
    expect(canAccess(alice, aliceComment, action)).toBe(true);
    expect(canAccess(staff, aliceComment, action)).toBe(true);
    expect(canAccess(bob, aliceComment, action)).toBe(false);
    expect(canAccess(anonymous, aliceComment, action)).toBe(false);
  });

  it('compares ownership by id, not by object identity', () => {
    const sameUserNewObject = { role: 'authenticated' as const, id: 1, username: 'renamed' };
    expect(canAccess(sameUserNewObject, aliceComment, 'update')).toBe(true);
  });

  it('denies non-staff when the author is unknown', () => {
    expect(canAccess(alice, { type: 'comment' }, 'retrieve')).toBe(false);
    expect(canAccess(staff, { type: 'comment' }, 'retrieve')).toBe(true);
  });
});

describe('authorize', () => {
  it('raises AuthenticationRequired for anonymous callers', () => {
    expect(() => authorize(anonymous, post, 'create')).toThrow(AuthenticationRequired);
  });

  it('raises PermissionDenied for authenticated callers', () => {
    expect(() => authorize(alice, post, 'delete')).toThrow(PermissionDenied);
    expect(() => authorize(bob, aliceComment, 'update')).toThrow(PermissionDenied);
  });

  it('returns quietly when permitted', () => {
    expect(() => authorize(staff, post, 'delete')).not.toThrow();
  });
});
