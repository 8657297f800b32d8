import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsSelect, FindOptionsWhere, Not, Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { User, isUniqueViolation, uniqueViolationConstraint } from '@taskapi/database';
import { FieldErrors, ValidationFailedException } from '../common/validation';
import { getNumber } from '../common/config/config-values';
import { StorageService } from '../storage/storage.service';
import { AccessTokenService } from '../auth/tokens/access-token.service';
import { InvalidCredentialsException } from '../auth/exceptions';
import { FieldConflictException } from './exceptions';
import {
  AVATAR_FOLDER,
  DEFAULT_AVATAR_MAX_SIZE_KB,
  UploadedImage,
  avatarViolations,
  detectImageType,
} from './avatar/avatar-image';

/** Default bcrypt cost; override with BCRYPT_SALT_ROUNDS */
const DEFAULT_BCRYPT_SALT_ROUNDS = 12;

/** Unique constraint name → the request field it guards */
const CONSTRAINT_FIELDS: Record<string, string> = {
  UQ_users_email: 'email',
  UQ_users_name: 'name',
};

/** passwordHash is `select: false` on the entity; login must ask for it. */
const SELECT_WITH_PASSWORD: FindOptionsSelect<User> = {
  id: true,
  name: true,
  email: true,
  passwordHash: true,
  avatarPath: true,
  createdAt: true,
  updatedAt: true,
};

export interface ProfileInput {
  name: string;
  email: string;
}

export interface RegistrationInput extends ProfileInput {
  password: string;
}

/**
 * UsersService: the credential store.
 *
 * Responsibilities:
 * - Registration and profile updates with name/email uniqueness
 * - Password hashing (bcrypt) and verification
 * - Avatar storage through StorageService
 *
 * Uniqueness is checked by lookup first so both offending fields can be
 * reported together (422). The database constraints stay authoritative:
 * a concurrent insert that slips past the lookup fails with a unique
 * violation, reported as 409.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);
  private readonly saltRounds: number;
  private readonly avatarMaxSizeKb: number;
  private dummyHash: Promise<string> | null = null;

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly storageService: StorageService,
    private readonly accessTokenService: AccessTokenService,
    configService: ConfigService,
  ) {
    this.saltRounds = getNumber(configService, 'BCRYPT_SALT_ROUNDS', DEFAULT_BCRYPT_SALT_ROUNDS);
    this.avatarMaxSizeKb = getNumber(
      configService,
      'AVATAR_MAX_SIZE_KB',
      DEFAULT_AVATAR_MAX_SIZE_KB,
    );
  }

  /**
   * Creates an account.
   *
   * @throws ValidationFailedException if name/email are taken or the avatar is not an image
   * @throws FieldConflictException if a concurrent registration took the name/email
   */
  async register(input: RegistrationInput, avatar?: UploadedImage): Promise<User> {
    const email = input.email.toLowerCase();

    const errors: FieldErrors = {
      ...(await this.uniquenessErrors({ name: input.name, email })),
      ...this.avatarErrors(avatar),
    };
    this.throwIfAny(errors);

    const passwordHash = await bcrypt.hash(input.password, this.saltRounds);
    const avatarPath = avatar ? await this.storeAvatar(avatar) : null;

    try {
      const user = await this.userRepository.save(
        this.userRepository.create({ name: input.name, email, passwordHash, avatarPath }),
      );
      this.logger.log(`User registered: ${user.id} (${user.email})`);
      return user;
    } catch (error) {
      if (avatarPath) {
        await this.discardAvatar(avatarPath);
      }
      throw this.translateWriteError(error);
    }
  }

  /**
   * Verifies an email/password pair.
   *
   * An unknown email is still checked against a dummy hash so both failure
   * paths cost one bcrypt comparison and return the same error.
   *
   * @throws InvalidCredentialsException on any mismatch
   */
  async authenticate(email: string, password: string): Promise<User> {
    const user = await this.userRepository.findOne({
      where: { email: email.trim().toLowerCase() },
      select: SELECT_WITH_PASSWORD,
    });

    const hash = user?.passwordHash ?? (await this.getDummyHash());
    const isPasswordValid = await bcrypt.compare(password, hash);

    if (!user || !isPasswordValid) {
      throw new InvalidCredentialsException();
    }

    return user;
  }

  /**
   * @throws UnauthorizedException if the user was deleted after the token was validated
   */
  async getProfile(userId: string): Promise<User> {
    const user = await this.userRepository.findOne({ where: { id: userId } });

    if (!user) {
      this.logger.error(`Profile requested for non-existent user: ${userId}`);
      throw new UnauthorizedException('User no longer exists');
    }

    return user;
  }

  /**
   * Replaces name and email, and the avatar when a new one is uploaded.
   * Uniqueness is checked against every user except this one.
   */
  async updateProfile(userId: string, input: ProfileInput, avatar?: UploadedImage): Promise<User> {
    const user = await this.getProfile(userId);
    const email = input.email.toLowerCase();

    const errors: FieldErrors = {
      ...(await this.uniquenessErrors({ name: input.name, email }, userId)),
      ...this.avatarErrors(avatar),
    };
    this.throwIfAny(errors);

    const previousAvatar = user.avatarPath;
    const newAvatar = avatar ? await this.storeAvatar(avatar) : null;

    user.name = input.name;
    user.email = email;
    if (newAvatar) {
      user.avatarPath = newAvatar;
    }

    let saved: User;
    try {
      saved = await this.userRepository.save(user);
    } catch (error) {
      if (newAvatar) {
        await this.discardAvatar(newAvatar);
      }
      throw this.translateWriteError(error);
    }

    if (newAvatar && previousAvatar) {
      await this.discardAvatar(previousAvatar);
    }

    this.logger.log(`Profile updated: ${saved.id}`);
    return saved;
  }

  /**
   * Stores a new password hash and signs out every other session.
   * The token used for this request stays valid.
   */
  async updatePassword(userId: string, password: string, currentTokenId?: string): Promise<void> {
    const passwordHash = await bcrypt.hash(password, this.saltRounds);
    const result = await this.userRepository.update({ id: userId }, { passwordHash });

    if (!result.affected) {
      throw new UnauthorizedException('User no longer exists');
    }

    await this.accessTokenService.revokeAllForUser(userId, currentTokenId);
    this.logger.log(`Password updated: ${userId}`);
  }

  // ── Private Helpers ───────────────────────────────────────

  private async uniquenessErrors(
    { name, email }: ProfileInput,
    exceptUserId?: string,
  ): Promise<FieldErrors> {
    const others: FindOptionsWhere<User> = exceptUserId ? { id: Not(exceptUserId) } : {};

    const [emailOwner, nameOwner] = await Promise.all([
      this.userRepository.findOne({ where: { ...others, email }, select: { id: true } }),
      this.userRepository.findOne({ where: { ...others, name }, select: { id: true } }),
    ]);

    const errors: FieldErrors = {};
    if (nameOwner) {
      errors['name'] = ['The name has already been taken.'];
    }
    if (emailOwner) {
      errors['email'] = ['The email has already been taken.'];
    }
    return errors;
  }

  private avatarErrors(avatar: UploadedImage | undefined): FieldErrors {
    if (!avatar) {
      return {};
    }
    const violations = avatarViolations(avatar, this.avatarMaxSizeKb);
    return violations.length > 0 ? { avatar: violations } : {};
  }

  private throwIfAny(errors: FieldErrors): void {
    if (Object.keys(errors).length > 0) {
      this.logger.debug(`Rejected fields: ${Object.keys(errors).join(', ')}`);
      throw new ValidationFailedException(errors);
    }
  }

  private async storeAvatar(avatar: UploadedImage): Promise<string> {
    const contentType = detectImageType(avatar.buffer) ?? avatar.mimetype;
    return this.storageService.uploadFile(
      AVATAR_FOLDER,
      avatar.buffer,
      avatar.originalname,
      contentType,
    );
  }

  /** Best-effort removal: a leftover object must not fail the request. */
  private async discardAvatar(objectKey: string): Promise<void> {
    try {
      await this.storageService.removeFile(objectKey);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not remove avatar "${objectKey}": ${message}`);
    }
  }

  private translateWriteError(error: unknown): unknown {
    if (!isUniqueViolation(error)) {
      return error;
    }
    const constraint = uniqueViolationConstraint(error);
    const field = constraint ? (CONSTRAINT_FIELDS[constraint] ?? null) : null;
    this.logger.warn(`Unique violation on write (${constraint ?? 'unknown constraint'})`);
    return new FieldConflictException(field);
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = bcrypt.hash('timing-equalizer', this.saltRounds);
    }
    return this.dummyHash;
  }
}
