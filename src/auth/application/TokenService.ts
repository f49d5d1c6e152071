// src/auth/application/TokenService.ts

/**
 * TokenService
 * ------------
 * Issues and verifies HS256 bearer tokens with a server-held secret.
 *
 * Verification is a pure function of (token, clock, secret): no session
 * store, no revocation list, no clock tolerance.
 */

import jwt, { JwtPayload, TokenExpiredError } from 'jsonwebtoken';

import type { AuthenticatedIdentity } from '../domain/AuthenticatedIdentity';
import { AuthenticationFailure } from '../../shared/errors/DomainErrors';

const ALGORITHM = 'HS256';

const RESERVED_CLAIMS = new Set(['sub', 'iat', 'exp']);

export type IssuedToken = {
  token: string;
  /** Unix seconds. */
  issuedAt: number;
  /** Unix seconds. */
  expiresAt: number;
};

export type TokenServiceOptions = {
  secret: string;
  /**
   * Token lifetime as a duration string, e.g. "30s", "10m", "2h", "7d", "1w".
   */
  expiresIn: string;
  /**
   * Clock in milliseconds (defaults to Date.now).
   */
  now?: () => number;
};

const UNIT_SECONDS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 3_600,
  d: 86_400,
  w: 604_800,
};

/**
 * Parse a duration like "7d" into seconds. Throws on anything else so a bad
 * configuration stops the process at startup.
 */
export function parseExpiresIn(value: string): number {
  const match = /^(\d+)\s*([a-zA-Z]+)$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid token lifetime "${value}"`);
  }

  const amount = Number(match[1]);
  const unitSeconds = UNIT_SECONDS[match[2].toLowerCase()];
  if (unitSeconds === undefined || amount <= 0) {
    throw new Error(`Invalid token lifetime "${value}"`);
  }

  return amount * unitSeconds;
}

export class TokenService {
  private readonly secret: string;
  private readonly lifetimeSeconds: number;
  private readonly now: () => number;

  public constructor(options: TokenServiceOptions) {
    if (options.secret.trim().length === 0) {
      throw new Error('Token secret must not be empty');
    }

    this.secret = options.secret;
    this.lifetimeSeconds = parseExpiresIn(options.expiresIn);
    this.now = options.now ?? Date.now;
  }

  public issue(subjectId: string, extraClaims: Record<string, unknown> = {}): IssuedToken {
    const issuedAt = this.nowSeconds();
    const expiresAt = issuedAt + this.lifetimeSeconds;

    const token = jwt.sign({ ...extraClaims, sub: subjectId, iat: issuedAt, exp: expiresAt }, this.secret, {
      algorithm: ALGORITHM,
    });

    return { token, issuedAt, expiresAt };
  }

  /**
   * Verify signature and mandatory claims (`sub`, `exp`).
   * Throws AuthenticationFailure ("expired" or "invalid") on rejection.
   */
  public verify(token: string): AuthenticatedIdentity {
    let decoded: string | JwtPayload;

    try {
      decoded = jwt.verify(token, this.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (err) {
      if (err instanceof TokenExpiredError) {
        throw new AuthenticationFailure('expired', 'Token expired', { cause: err });
      }
      throw new AuthenticationFailure('invalid', 'Token invalid', { cause: err });
    }

    if (typeof decoded === 'string') {
      throw new AuthenticationFailure('invalid', 'Token invalid', {
        cause: new Error('Token payload is not a JSON object'),
      });
    }

    const { sub, exp, iat } = decoded;
    if (typeof sub !== 'string' || sub.trim().length === 0 || typeof exp !== 'number') {
      throw new AuthenticationFailure('invalid', 'Token invalid', {
        cause: new Error('Token is missing mandatory claims (sub, exp)'),
      });
    }

    const claims: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(decoded)) {
      if (!RESERVED_CLAIMS.has(key)) claims[key] = value;
    }

    return {
      subjectId: sub,
      issuedAt: typeof iat === 'number' ? iat : null,
      expiresAt: exp,
      claims,
    };
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }
}
