import { AuthenticationRequired, PermissionDenied } from '../errors.js';
import type { Caller } from './caller.js';

export type ReadAction = 'list' | 'retrieve' | 'get';
export type WriteAction = 'create' | 'update' | 'delete';
export type Action = ReadAction | WriteAction;

/**
 * What a decision is made about. Comment checks on an existing row carry
 * the author id; a comment that does not exist yet (create) has none.
 */
export type Resource = { type: 'post' } | { type: 'comment'; authorId?: number };

const readActions: ReadonlySet<Action> = new Set<Action>(['list', 'retrieve', 'get']);

export function isReadAction(action: Action): action is ReadAction {
  return readActions.has(action);
}

function canAccessPost(caller: Caller, action: Action): boolean {
  if (isReadAction(action)) return true;
  switch (caller.role) {
    case 'staff':
      return true;
    case 'authenticated':
      return action === 'create';
    case 'anonymous':
      return false;
  }
}

function canAccessComment(caller: Caller, authorId: number | undefined, action: Action): boolean {
  switch (caller.role) {
    case 'anonymous':
      return false;
    case 'staff':
      return true;
    case 'authenticated':
      if (action === 'create') return true;
      return authorId !== undefined && authorId === caller.id;
  }
}

export function canAccess(caller: Caller, resource: Resource, action: Action): boolean {
  switch (resource.type) {
    case 'post':
      return canAccessPost(caller, action);
    case 'comment':
      return canAccessComment(caller, resource.authorId, action);
  }
}

/**
 * Throws when `canAccess` denies: 401 for anonymous callers, 403 for
 * everyone else.
 */
export function authorize(caller: Caller, resource: Resource, action: Action): void {
  if (canAccess(caller, resource, action)) return;
  if (caller.role === 'anonymous') {
    throw new AuthenticationRequired();
  }
  throw new PermissionDenied();
}
