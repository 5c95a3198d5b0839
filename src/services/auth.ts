// src/services/auth.ts
import axios, { AxiosInstance } from 'axios';
import { createPublicKey, JsonWebKey, KeyObject } from 'crypto';
import jwt, { JwtPayload } from 'jsonwebtoken';
import { AzureTokenClaims } from '../types/auth.types';
import { AppError, UnauthorizedError } from '../utils/errors';

export interface TokenVerifier {
  verify(token: string): Promise<AzureTokenClaims>;
}

/** Returns the public key for a token's `kid` header. */
export type SigningKeyResolver = (kid: string | undefined) => Promise<KeyObject>;

export interface TokenVerifierOptions {
  audience: string;
  issuer: string;
  clockToleranceSeconds: number;
}

type SigningJwk = JsonWebKey & { kid?: string };

/**
 * Pull the token out of an `Authorization: Bearer <token>` header.
 */
export function extractBearerToken(header: string | undefined): string {
  if (!header) {
    throw new UnauthorizedError('Missing Authorization header');
  }

  const [scheme, token, ...rest] = header.split(' ');
  if (scheme !== 'Bearer' || !token || rest.length > 0) {
    throw new UnauthorizedError('Invalid Authorization header format');
  }

  return token;
}

/**
 * Resolve signing keys from the tenant's JWKS endpoint. Keys are cached by
 * `kid`; an unknown `kid` triggers one refetch before the token is rejected.
 */
export function createJwksKeyResolver(jwksUri: string, http: AxiosInstance = axios.create()): SigningKeyResolver {
  const cache = new Map<string, KeyObject>();

  const refresh = async () => {
    const { data } = await http.get<{ keys: SigningJwk[] }>(jwksUri);
    cache.clear();
    for (const jwk of data.keys) {
      if (jwk.kid) {
        cache.set(jwk.kid, createPublicKey({ key: jwk, format: 'jwk' }));
      }
    }
  };

  return async (kid) => {
    if (!kid) {
      throw new UnauthorizedError('Token has no key id');
    }

    if (!cache.has(kid)) {
      await refresh();
    }

    const key = cache.get(kid);
    if (!key) {
      throw new UnauthorizedError('Token signed with an unknown key');
    }
    return key;
  };
}

const optionalString = (value: unknown) => (typeof value === 'string' ? value : undefined);

function toClaims(payload: JwtPayload): AzureTokenClaims {
  const roles: unknown = payload.roles;

  return {
    oid: optionalString(payload.oid),
    upn: optionalString(payload.upn),
    preferred_username: optionalString(payload.preferred_username),
    name: optionalString(payload.name),
    aud: payload.aud,
    iss: payload.iss,
    tid: optionalString(payload.tid),
    roles: Array.isArray(roles) ? roles.filter((r): r is string => typeof r === 'string') : undefined,
    iat: payload.iat,
    exp: payload.exp,
  };
}

/**
 * Verifies Azure AD access tokens issued for this API (RS256).
 */
export class AzureTokenVerifier implements TokenVerifier {
  constructor(
    private readonly options: TokenVerifierOptions,
    private readonly resolveKey: SigningKeyResolver
  ) {}

  async verify(token: string): Promise<AzureTokenClaims> {
    const decoded = jwt.decode(token, { complete: true });
    if (!decoded) {
      throw new UnauthorizedError('Malformed token');
    }

    const key = await this.resolveKey(decoded.header.kid);

    try {
      const payload = jwt.verify(token, key, {
        algorithms: ['RS256'],
        audience: this.options.audience,
        issuer: this.options.issuer,
        clockTolerance: this.options.clockToleranceSeconds,
      });

      if (typeof payload === 'string') {
        throw new UnauthorizedError('Unexpected token payload');
      }
      return toClaims(payload);
    } catch (err) {
      if (err instanceof AppError) throw err;
      if (err instanceof jwt.TokenExpiredError) throw new UnauthorizedError('Token expired');
      throw new UnauthorizedError('Invalid token');
    }
  }
}
