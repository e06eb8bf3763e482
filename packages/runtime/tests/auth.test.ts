import { describe, expect, it, vi } from 'vitest';
import type { FastifyRequest } from 'fastify';
import { AuthenticationRequired } from '../errors.js';
import { createAuthenticator, issueMockToken, mapPayloadToCaller, type AuthConfig } from '../http/auth.js';

const baseConfig: AuthConfig = {
  provider: 'mock',
  issuer: 'https://mock.postgate.test',
  audience: 'postgate-test',
  roleClaim: 'roles',
  usernameClaim: 'preferred_username',
  staffRole: 'staff',
};

function requestWith(authorization?: string): FastifyRequest {
  return {
    headers: authorization === undefined ? {} : { authorization },
    log: { debug: vi.fn() },
  } as unknown as FastifyRequest;
}

describe('authenticator (mock provider)', () => {
  it('maps a staff token to a staff caller', async () => {
    const { token } = await issueMockToken(baseConfig, { sub: 7, username: 'carol', roles: ['staff', 'writer'] });
    const authenticate = createAuthenticator(baseConfig);

    await expect(authenticate(requestWith(`Bearer ${token}`))).resolves.toEqual({
      role: 'staff',
      id: 7,
      username: 'carol',
    });
  });

  it('maps a token without the staff role to an authenticated caller', async () => {
    const { token } = await issueMockToken(baseConfig, { sub: 3, username: 'dave', roles: ['writer'] });
    const authenticate = createAuthenticator(baseConfig);

    await expect(authenticate(requestWith(`Bearer ${token}`))).resolves.toEqual({
      role: 'authenticated',
      id: 3,
      username: 'dave',
    });
  });

  it('treats a request without credentials as anonymous', async () => {
    const authenticate = createAuthenticator(baseConfig);
    await expect(authenticate(requestWith())).resolves.toEqual({ role: 'anonymous' });
  });

  it('rejects a non-bearer scheme', async () => {
    const authenticate = createAuthenticator(baseConfig);
    await expect(authenticate(requestWith('Basic dXNlcjpwYXNz'))).rejects.toThrow(AuthenticationRequired);
  });

  it('rejects an expired token', async () => {
    const { token } = await issueMockToken(baseConfig, { sub: 3, expiresInSeconds: -60 });
    const authenticate = createAuthenticator(baseConfig);

    await expect(authenticate(requestWith(`Bearer ${token}`))).rejects.toThrow('Invalid or expired token.');
  });

  it('rejects a token minted for another audience', async () => {
    const { token } = await issueMockToken({ ...baseConfig, audience: 'someone-else' }, { sub: 3 });
    const authenticate = createAuthenticator(baseConfig);

    await expect(authenticate(requestWith(`Bearer ${token}`))).rejects.toThrow(AuthenticationRequired);
  });

  it('ignores credentials when no provider is configured', async () => {
    const authenticate = createAuthenticator(null);
    await expect(authenticate(requestWith('Bearer anything'))).resolves.toEqual({ role: 'anonymous' });
  });
});

describe('mapPayloadToCaller', () => {
  it('requires a numeric subject', () => {
    expect(() => mapPayloadToCaller({ sub: 'abc' }, baseConfig)).toThrow('Token subject must be a numeric user id.');
    expect(() => mapPayloadToCaller({}, baseConfig)).toThrow(AuthenticationRequired);
  });

  it('rejects subjects beyond the user key range', () => {
    expect(() => mapPayloadToCaller({ sub: '3000000000' }, baseConfig)).toThrow('Token subject must be a numeric user id.');
    expect(mapPayloadToCaller({ sub: '2147483647' }, baseConfig)).toMatchObject({ id: 2147483647 });
  });

  it('derives a username when the claim is missing', () => {
    expect(mapPayloadToCaller({ sub: '12' }, baseConfig)).toEqual({ role: 'authenticated', id: 12, username: 'user-12' });
  });

  it('reads space separated role strings', () => {
    expect(mapPayloadToCaller({ sub: '5', roles: 'writer staff' }, baseConfig)).toEqual({
      role: 'staff',
      id: 5,
      username: 'user-5',
    });
  });
});
