import { Injectable, Logger } from '@nestjs/common';
import { UsersService } from '../users/users.service';
import { UserProfileDto } from '../users/dto';
import type { UploadedImage } from '../users/avatar/avatar-image';
import { AccessTokenService } from './tokens/access-token.service';
import { RegisterDto, LoginDto, LoginResponseDto, RegisterResponseDto } from './dto';
import type { RequestUser } from './interfaces';

/**
 * AuthService: account creation and the token session lifecycle.
 *
 * Credentials live in UsersService; tokens in AccessTokenService. This
 * service only sequences them:
 * - register(): create the account (no token; clients log in next)
 * - login():    verify credentials, issue a fresh token
 * - logout():   revoke exactly the token used for the request
 *
 * Neither passwords nor plaintext tokens are ever logged.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly accessTokenService: AccessTokenService,
  ) {}

  async register(dto: RegisterDto, avatar?: UploadedImage): Promise<RegisterResponseDto> {
    const user = await this.usersService.register(dto, avatar);
    return new RegisterResponseDto(UserProfileDto.fromEntity(user));
  }

  /**
   * @throws InvalidCredentialsException if the email is unknown or the password is wrong
   */
  async login(dto: LoginDto): Promise<LoginResponseDto> {
    const user = await this.usersService.authenticate(dto.email, dto.password);
    const issued = await this.accessTokenService.issue(user);

    this.logger.log(`User logged in: ${user.id} (token ${issued.token.id})`);

    return new LoginResponseDto(issued.plainTextToken, issued.expiresIn);
  }

  async logout(principal: RequestUser): Promise<void> {
    await this.accessTokenService.revoke(principal.tokenId);
    this.logger.log(`User logged out: ${principal.userId} (token ${principal.tokenId})`);
  }
}
