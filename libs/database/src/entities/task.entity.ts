import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { User } from './user.entity';

/** State assigned to every newly created task */
export const DEFAULT_TASK_STATE = 'active';

/** Largest value the int4 `id` column can hold */
export const MAX_TASK_ID = 2_147_483_647;

/**
 * Task entity: a unit of work owned by exactly one user.
 *
 * Invariants:
 * - ownerId is always derived from the authenticated principal, never
 *   from the request body
 * - state is free-form text; no transitions are enforced
 * - ids are sequential, so ordering by id is insertion order
 */
@Entity('tasks')
@Index('IDX_tasks_owner_id_id', ['ownerId', 'id'])
export class Task {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 255, default: DEFAULT_TASK_STATE })
  state!: string;

  @Column({ type: 'uuid', name: 'owner_id' })
  ownerId!: string;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => User, (user) => user.tasks, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'owner_id' })
  owner!: User;
}
