// ── Entities ────────────────────────────────────────────────
export { User } from './entities/user.entity';
export { Task, DEFAULT_TASK_STATE, MAX_TASK_ID } from './entities/task.entity';
export { AccessToken } from './entities/access-token.entity';

// ── Errors ──────────────────────────────────────────────────
export { isUniqueViolation, uniqueViolationConstraint } from './errors/unique-violation';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
