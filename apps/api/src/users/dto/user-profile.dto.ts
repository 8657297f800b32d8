import type { User } from '@taskapi/database';

/**
 * Public user profile data. Never includes passwordHash.
 *
 * Built only through fromEntity() so every field that leaves the API
 * is listed explicitly.
 */
export class UserProfileDto {
  id: string;
  name: string;
  email: string;
  avatarPath: string | null;
  createdAt: Date;
  updatedAt: Date;

  private constructor(user: User) {
    this.id = user.id;
    this.name = user.name;
    this.email = user.email;
    this.avatarPath = user.avatarPath;
    this.createdAt = user.createdAt;
    this.updatedAt = user.updatedAt;
  }

  static fromEntity(user: User): UserProfileDto {
    return new UserProfileDto(user);
  }
}

/** Response for PUT /user */
export class ProfileUpdatedResponseDto {
  message: string;
  user: UserProfileDto;

  constructor(user: UserProfileDto) {
    this.message = 'Profile updated';
    this.user = user;
  }
}
