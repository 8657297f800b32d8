import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when a key has used up its budget for the current window.
 *
 * HTTP 429 Too Many Requests. The same hint is sent in the Retry-After
 * header by ThrottleGuard.
 */
export class RateLimitExceededException extends HttpException {
  constructor(readonly retryAfterSeconds: number) {
    super(
      {
        statusCode: HttpStatus.TOO_MANY_REQUESTS,
        error: 'Too Many Requests',
        message: `Too many requests. Retry after ${retryAfterSeconds} seconds.`,
        retryAfter: retryAfterSeconds,
      },
      HttpStatus.TOO_MANY_REQUESTS,
    );
  }
}
