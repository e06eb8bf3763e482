import { AuthenticationRequired } from '../errors.js';

export type Role = 'anonymous' | 'authenticated' | 'staff';

export interface AnonymousCaller {
  role: 'anonymous';
}

export interface IdentifiedCaller {
  role: 'authenticated' | 'staff';
  id: number;
  username: string;
}

/** Per-request identity. Built by the authenticator, never persisted. */
export type Caller = AnonymousCaller | IdentifiedCaller;

export const ANONYMOUS: AnonymousCaller = Object.freeze({ role: 'anonymous' });

export function isAuthenticated(caller: Caller): caller is IdentifiedCaller {
  return caller.role !== 'anonymous';
}

export function isStaff(caller: Caller): caller is IdentifiedCaller & { role: 'staff' } {
  return caller.role === 'staff';
}

export function callerLabel(caller: Caller): string {
  return isAuthenticated(caller) ? `${caller.id} (${caller.role})` : 'anonymous';
}

export function requireIdentity(caller: Caller): IdentifiedCaller {
  if (!isAuthenticated(caller)) {
    throw new AuthenticationRequired();
  }
  return caller;
}
