// tests/http/tokenAuthenticator.test.ts

import type { AuthenticatedIdentity } from '../../src/auth/domain/AuthenticatedIdentity';
import { TokenAuthenticator, extractBearerToken } from '../../src/http/auth/tokenAuthenticator';
import { AuthenticationFailure } from '../../src/shared/errors/DomainErrors';

const identity: AuthenticatedIdentity = {
  subjectId: 'user-1',
  issuedAt: 1_700_000_000,
  expiresAt: 1_700_003_600,
  claims: { username: 'alice' },
};

describe('extractBearerToken', () => {
  test.each(['Bearer abc.def.ghi', 'bearer abc.def.ghi', 'Bearer   abc.def.ghi', '  Bearer abc.def.ghi  '])(
    'accepts %p',
    (header) => {
      expect(extractBearerToken(header)).toEqual({ ok: true, value: 'abc.def.ghi' });
    },
  );

  test.each([undefined, '', 'Bearer', 'Bearer ', 'Basic dXNlcjpwYXNz', 'Bearer a b', 'Bearer a,Bearer b', 'Token abc'])(
    'rejects %p as missing credentials',
    (header) => {
      const result = extractBearerToken(header);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.businessCode).toBe(40100);
        expect(result.error.publicMessage).toBe('Missing or malformed Authorization header');
      }
    },
  );
});

describe('TokenAuthenticator', () => {
  test('returns the verified identity', () => {
    const verify = jest.fn((_token: string): AuthenticatedIdentity => identity);
    const authenticator = new TokenAuthenticator({ verify });

    expect(authenticator.authenticate('Bearer tok')).toEqual({ ok: true, value: identity });
    expect(verify).toHaveBeenCalledWith('tok');
  });

  test('does not call the verifier without a credential', () => {
    const verify = jest.fn((_token: string): AuthenticatedIdentity => identity);
    const authenticator = new TokenAuthenticator({ verify });

    const result = authenticator.authenticate(undefined);

    expect(result.ok).toBe(false);
    expect(verify).not.toHaveBeenCalled();
  });

  test('classifies verifier rejections', () => {
    const authenticator = new TokenAuthenticator({
      verify: () => {
        throw new AuthenticationFailure('expired', 'Token expired');
      },
    });

    const result = authenticator.authenticate('Bearer tok');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({ kind: 'Unauthorized', businessCode: 40101, publicMessage: 'Token expired' });
    }
  });
});
