import {
  Controller,
  Post,
  Get,
  Body,
  UseGuards,
  UseInterceptors,
  UploadedFile,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { Throttle, ThrottleGuard } from '../throttle';
import type { MessageResponseDto } from '../common/dto/message-response.dto';
import { AuthService } from './auth.service';
import { RegisterDto, LoginDto, LoginResponseDto, RegisterResponseDto } from './dto';
import { BearerAuthGuard } from './guards';
import { CurrentUser } from './decorators';
import type { RequestUser } from './interfaces';

/**
 * AuthController: REST endpoints for authentication.
 *
 * Routes:
 * - POST /auth/register  → Create a new account (public, `auth` throttle)
 * - POST /auth/login     → Exchange credentials for a bearer token (public, `auth` throttle)
 * - GET  /auth/logout    → Revoke the token used for the request (protected)
 *
 * Guards run before interceptors, so a throttled register request is
 * rejected before its multipart body is parsed.
 */
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * Register a new user. Accepts JSON, or multipart with an `avatar` image.
   *
   * @returns 201 Created with the public profile
   * @throws 422 if a field is invalid, or name/email are taken
   * @throws 409 if a concurrent registration took the name/email
   * @throws 429 when the `auth` budget is used up
   */
  @Post('register')
  @UseGuards(ThrottleGuard)
  @Throttle('auth')
  @UseInterceptors(FileInterceptor('avatar'))
  @HttpCode(HttpStatus.CREATED)
  async register(
    @Body() dto: RegisterDto,
    @UploadedFile() avatar: Express.Multer.File | undefined,
  ): Promise<RegisterResponseDto> {
    return this.authService.register(dto, avatar);
  }

  /**
   * @returns 200 OK with the access token
   * @throws 401 if credentials are invalid
   * @throws 429 when the `auth` budget is used up
   */
  @Post('login')
  @UseGuards(ThrottleGuard)
  @Throttle('auth')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto): Promise<LoginResponseDto> {
    return this.authService.login(dto);
  }

  @Get('logout')
  @UseGuards(BearerAuthGuard, ThrottleGuard)
  @Throttle('api')
  async logout(@CurrentUser() user: RequestUser): Promise<MessageResponseDto> {
    await this.authService.logout(user);
    return { message: 'Successfully logged out. Token revoked.' };
  }
}
