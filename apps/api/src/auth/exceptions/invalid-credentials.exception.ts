import { UnauthorizedException } from '@nestjs/common';

/**
 * Thrown when login credentials are invalid.
 *
 * HTTP 401 Unauthorized. The same message is used for an unknown email
 * and for a wrong password so the response never reveals which one failed.
 */
export class InvalidCredentialsException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Invalid credentials',
    });
  }
}
