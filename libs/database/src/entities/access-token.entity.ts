import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
  Unique,
} from 'typeorm';
import { User } from './user.entity';

/**
 * AccessToken entity: server-side record of an opaque bearer token.
 *
 * Only the SHA-256 digest of the token is stored; the plaintext is handed
 * to the client once at issuance. A token is valid while its row exists
 * and expiresAt is null or in the future. Revocation deletes the row.
 */
@Entity('access_tokens')
@Unique('UQ_access_tokens_token_hash', ['tokenHash'])
export class AccessToken {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('IDX_access_tokens_user_id')
  @Column({ type: 'uuid', name: 'user_id' })
  userId!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'char', length: 64, name: 'token_hash' })
  tokenHash!: string;

  @Column({ type: 'timestamptz', name: 'last_used_at', nullable: true })
  lastUsedAt!: Date | null;

  @Column({ type: 'timestamptz', name: 'expires_at', nullable: true })
  expiresAt!: Date | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => User, (user) => user.accessTokens, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'user_id' })
  user!: User;
}
