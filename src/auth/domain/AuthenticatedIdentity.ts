/**
 * Identity of the caller, decoded from a verified bearer token.
 *
 * Owned by a single request: created by the token authenticator and handed to
 * the route handler. Never cached or shared between requests.
 */
export interface AuthenticatedIdentity {
  /**
   * Token subject (`sub`): the user id.
   */
  subjectId: string;

  /**
   * `iat` in Unix seconds, or null when the token did not carry one.
   */
  issuedAt: number | null;

  /**
   * `exp` in Unix seconds.
   */
  expiresAt: number;

  /**
   * Every other claim the token carried.
   */
  claims: Record<string, unknown>;
}
