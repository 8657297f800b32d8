import type { UserProfileDto } from '../../users/dto';

/**
 * Response shape for a successful login.
 *
 * Follows the OAuth2 token response convention. `expiresIn` is null when
 * tokens live until they are revoked.
 */
export class LoginResponseDto {
  message: string;
  accessToken: string;
  tokenType: 'Bearer';
  expiresIn: number | null;

  constructor(accessToken: string, expiresIn: number | null) {
    this.message = 'Login successful';
    this.accessToken = accessToken;
    this.tokenType = 'Bearer';
    this.expiresIn = expiresIn;
  }
}

/** Response for POST /auth/register. No token is issued; clients log in next. */
export class RegisterResponseDto {
  message: string;
  user: UserProfileDto;

  constructor(user: UserProfileDto) {
    this.message = 'User registered successfully';
    this.user = user;
  }
}
