// src/http/auth/tokenAuthenticator.ts

/**
 * Token authenticator stage
 *
 * NoCredential -> Extracted -> Verified | Rejected
 *
 * - Extraction: exactly one `Bearer <token>` value in Authorization
 * - Verification: delegated to the token verifier (signature, expiry, claims)
 * - Rejections are classified as Unauthorized; nothing is retried
 */

import type { AuthenticatedIdentity } from '../../auth/domain/AuthenticatedIdentity';
import { AuthenticationFailure } from '../../shared/errors/DomainErrors';
import { classifyError } from '../errors/errorClassifier';
import { StageResult, abort, andThen, proceed } from '../pipeline/stage';

export interface TokenVerifierPort {
  verify(token: string): AuthenticatedIdentity;
}

const BEARER_PATTERN = /^Bearer +([^\s,]+)$/i;

export function extractBearerToken(authorization: string | undefined): StageResult<string> {
  const match = authorization === undefined ? null : BEARER_PATTERN.exec(authorization.trim());

  if (!match) {
    return abort(
      classifyError(new AuthenticationFailure('missing', 'Missing or malformed Authorization header')),
    );
  }

  return proceed(match[1]);
}

export class TokenAuthenticator {
  public constructor(private readonly verifier: TokenVerifierPort) {}

  public authenticate(authorization: string | undefined): StageResult<AuthenticatedIdentity> {
    return andThen(extractBearerToken(authorization), (token) => {
      try {
        return proceed(this.verifier.verify(token));
      } catch (err) {
        return abort(classifyError(err));
      }
    });
  }
}
