import type { FastifyRequest } from 'fastify';
import {
  createLocalJWKSet,
  createRemoteJWKSet,
  exportJWK,
  generateKeyPair,
  jwtVerify,
  SignJWT,
  type JWK,
  type JWTPayload,
  type JWTVerifyGetKey,
  type KeyLike,
} from 'jose';
import { parseList, type Env } from '../env.js';
import { AuthenticationRequired } from '../errors.js';
import { parseStorableId } from '../ids.js';
import { ANONYMOUS, type Caller } from '../policy/caller.js';

interface BaseAuthConfig {
  issuer: string;
  audience: string;
  roleClaim: string;
  usernameClaim: string;
  staffRole: string;
}

export type AuthConfig =
  | (BaseAuthConfig & { provider: 'mock' })
  | (BaseAuthConfig & { provider: 'oidc'; jwksUri: string });

export type Authenticator = (request: FastifyRequest) => Promise<Caller>;

interface MockKeys {
  publicJwk: JWK;
  privateKey: KeyLike;
}

const MOCK_KID = 'postgate-mock';
let mockKeysPromise: Promise<MockKeys> | null = null;

export function loadAuthConfigFromEnv(env: Env = process.env): AuthConfig | null {
  const providerRaw = env.AUTH_PROVIDER;
  if (!providerRaw) {
    return null;
  }

  const base: BaseAuthConfig = {
    issuer: env.AUTH_ISSUER ?? 'https://auth.postgate.local',
    audience: env.AUTH_AUDIENCE ?? 'postgate',
    roleClaim: env.AUTH_ROLE_CLAIM ?? 'roles',
    usernameClaim: env.AUTH_USERNAME_CLAIM ?? 'preferred_username',
    staffRole: env.AUTH_STAFF_ROLE ?? 'staff',
  };

  const provider = providerRaw.toLowerCase();
  if (provider === 'mock') {
    return { ...base, provider };
  }
  if (provider === 'oidc') {
    const jwksUri = env.AUTH_JWKS_URI;
    if (!jwksUri) {
      throw new Error('AUTH_JWKS_URI is required when AUTH_PROVIDER=oidc');
    }
    return { ...base, provider, jwksUri };
  }

  console.warn(`Unsupported AUTH_PROVIDER "${providerRaw}", auth disabled.`);
  return null;
}

async function ensureMockKeys(): Promise<MockKeys> {
  if (!mockKeysPromise) {
    mockKeysPromise = generateKeyPair('RS256').then(async ({ publicKey, privateKey }) => {
      const publicJwk = await exportJWK(publicKey);
      publicJwk.use = 'sig';
      publicJwk.alg = 'RS256';
      publicJwk.kid = MOCK_KID;
      return { publicJwk, privateKey };
    });
  }
  return mockKeysPromise;
}

function extractRoles(payload: JWTPayload, config: AuthConfig): string[] {
  const rawRoles = payload[config.roleClaim] ?? payload.role;
  if (Array.isArray(rawRoles)) {
    return rawRoles.map(r => String(r)).filter(Boolean);
  }
  if (typeof rawRoles === 'string') {
    return parseList(rawRoles.replace(/\s+/g, ',')) ?? [];
  }
  return [];
}

export function mapPayloadToCaller(payload: JWTPayload, config: AuthConfig): Caller {
  const id = typeof payload.sub === 'string' ? parseStorableId(payload.sub) : null;
  if (id === null) {
    throw new AuthenticationRequired('Token subject must be a numeric user id.');
  }
  const claimedName = payload[config.usernameClaim];
  const username = typeof claimedName === 'string' && claimedName.trim() ? claimedName.trim() : `user-${id}`;
  const staff = extractRoles(payload, config).includes(config.staffRole);

  return { role: staff ? 'staff' : 'authenticated', id, username };
}

function extractBearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (typeof header !== 'string' || !header.trim()) {
    return null;
  }
  const [scheme, token] = header.trim().split(/\s+/);
  if (!scheme || !token || scheme.toLowerCase() !== 'bearer') {
    throw new AuthenticationRequired('Invalid authorization header.');
  }
  return token;
}

function createVerifier(config: AuthConfig): Promise<JWTVerifyGetKey> {
  if (config.provider === 'mock') {
    return ensureMockKeys().then(keys => createLocalJWKSet({ keys: [keys.publicJwk] }));
  }
  return Promise.resolve(createRemoteJWKSet(new URL(config.jwksUri)));
}

/**
 * Builds the per-request authenticator. Requests without credentials are
 * anonymous; credentials that fail verification are rejected with 401.
 */
export function createAuthenticator(config: AuthConfig | null): Authenticator {
  if (!config) {
    return async () => ANONYMOUS;
  }
  const verifierPromise = createVerifier(config);

  return async function authenticate(request: FastifyRequest): Promise<Caller> {
    const token = extractBearerToken(request);
    if (!token) {
      return ANONYMOUS;
    }

    const key = await verifierPromise;
    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, key, {
        issuer: config.issuer,
        audience: config.audience,
      }));
    } catch (error) {
      request.log.debug({ err: error }, 'Bearer token rejected');
      throw new AuthenticationRequired('Invalid or expired token.');
    }
    return mapPayloadToCaller(payload, config);
  };
}

export interface MockTokenOverrides {
  sub?: number;
  username?: string;
  roles?: string[];
  claims?: Record<string, unknown>;
  expiresInSeconds?: number;
}

export async function issueMockToken(
  config: AuthConfig,
  overrides: MockTokenOverrides = {},
): Promise<{ token: string; payload: JWTPayload; expiresIn: number }> {
  if (config.provider !== 'mock') {
    throw new Error('issueMockToken is only available when AUTH_PROVIDER=mock');
  }

  const { privateKey, publicJwk } = await ensureMockKeys();
  const now = Math.floor(Date.now() / 1000);
  const expiresIn = overrides.expiresInSeconds ?? 15 * 60;
  const payload: JWTPayload = {
    ...(overrides.claims ?? {}),
    sub: String(overrides.sub ?? 1),
    [config.usernameClaim]: overrides.username ?? 'mock-user',
    [config.roleClaim]: overrides.roles ?? [],
  };

  const token = await new SignJWT(payload)
    .setProtectedHeader({ alg: 'RS256', kid: publicJwk.kid ?? MOCK_KID })
    .setIssuedAt(now)
    .setExpirationTime(now + expiresIn)
    .setIssuer(config.issuer)
    .setAudience(config.audience)
    .sign(privateKey);

  return { token, payload, expiresIn };
}
