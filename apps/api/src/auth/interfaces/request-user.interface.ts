/**
 * Shape of request.user after bearer token validation.
 * Populated by BearerStrategy.validate() and attached by Passport.
 */
export interface RequestUser {
  userId: string;
  email: string;
  /** Id of the access token that authenticated this request */
  tokenId: string;
}
