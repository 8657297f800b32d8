import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Unique,
} from 'typeorm';
import { Task } from './task.entity';
import { AccessToken } from './access-token.entity';

/**
 * User entity: an account that owns tasks and access tokens.
 *
 * Invariants:
 * - Email and name are unique across all users (enforced by the database,
 *   not only by the application-level lookup)
 * - Email is stored lower-cased
 * - Password is stored as a bcrypt hash and is never serialized
 * - Deleting a user cascades to all their tasks and tokens
 */
@Entity('users')
@Unique('UQ_users_email', ['email'])
@Unique('UQ_users_name', ['name'])
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 255 })
  email!: string;

  @Column({ type: 'varchar', length: 255, name: 'password_hash', select: false })
  passwordHash!: string;

  /** Object key of the avatar image in the avatar bucket */
  @Column({ type: 'varchar', length: 1024, name: 'avatar_path', nullable: true })
  avatarPath!: string | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @OneToMany(() => Task, (task) => task.owner, { cascade: false })
  tasks!: Task[];

  @OneToMany(() => AccessToken, (token) => token.user, { cascade: false })
  accessTokens!: AccessToken[];
}
