import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { RequestUser } from '../interfaces';

/**
 * Parameter decorator that extracts the authenticated principal from the request.
 *
 * Usage:
 * ```ts
 * @Get()
 * @UseGuards(BearerAuthGuard)
 * show(@CurrentUser() user: RequestUser): Promise<UserProfileDto> {
 *   return this.usersService.getProfile(user.userId);
 * }
 * ```
 *
 * Requires BearerAuthGuard to be applied: otherwise request.user is undefined.
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): RequestUser => {
    const request = ctx.switchToHttp().getRequest<{ user: RequestUser }>();
    return request.user;
  },
);
