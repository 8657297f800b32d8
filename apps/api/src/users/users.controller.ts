import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Patch,
  Put,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { BearerAuthGuard } from '../auth/guards';
import { CurrentUser } from '../auth/decorators';
import type { RequestUser } from '../auth/interfaces';
import { Throttle, ThrottleGuard } from '../throttle';
import type { MessageResponseDto } from '../common/dto/message-response.dto';
import { UsersService } from './users.service';
import {
  ProfileUpdatedResponseDto,
  UpdatePasswordDto,
  UpdateProfileDto,
  UserProfileDto,
} from './dto';

/**
 * REST endpoints for the authenticated user's own account.
 *
 * Routes:
 * - GET   /user  → profile
 * - PUT   /user  → update name, email and optionally avatar (multipart)
 * - PATCH /user  → change password
 */
@Controller('user')
@UseGuards(BearerAuthGuard, ThrottleGuard)
@Throttle('api')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get()
  async show(@CurrentUser() user: RequestUser): Promise<UserProfileDto> {
    return UserProfileDto.fromEntity(await this.usersService.getProfile(user.userId));
  }

  /**
   * @throws 422 if name/email are invalid or taken, or the avatar is not an image
   * @throws 413 if the avatar exceeds AVATAR_MAX_SIZE_KB
   */
  @Put()
  @UseInterceptors(FileInterceptor('avatar'))
  async updateProfile(
    @CurrentUser() user: RequestUser,
    @Body() dto: UpdateProfileDto,
    @UploadedFile() avatar: Express.Multer.File | undefined,
  ): Promise<ProfileUpdatedResponseDto> {
    const updated = await this.usersService.updateProfile(user.userId, dto, avatar);
    return new ProfileUpdatedResponseDto(UserProfileDto.fromEntity(updated));
  }

  @Patch()
  @HttpCode(HttpStatus.OK)
  async updatePassword(
    @CurrentUser() user: RequestUser,
    @Body() dto: UpdatePasswordDto,
  ): Promise<MessageResponseDto> {
    await this.usersService.updatePassword(user.userId, dto.password, user.tokenId);
    return { message: 'Password updated successfully' };
  }
}
