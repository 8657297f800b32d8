import { SetMetadata } from '@nestjs/common';
import { THROTTLE_PROFILE_KEY, ThrottleProfileName } from './throttle.constants';

/**
 * Assigns a route (or every route of a controller) to a rate-limit group.
 * Has no effect unless ThrottleGuard is applied to the same route.
 *
 * ```ts
 * @Post('login')
 * @UseGuards(ThrottleGuard)
 * @Throttle('auth')
 * login(@Body() dto: LoginDto) { ... }
 * ```
 */
export const Throttle = (profile: ThrottleProfileName): MethodDecorator & ClassDecorator =>
  SetMetadata(THROTTLE_PROFILE_KEY, profile);
