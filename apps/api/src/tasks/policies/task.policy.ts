import type { Task } from '@taskapi/database';
import type { RequestUser } from '../../auth/interfaces';

/**
 * Whether the principal may view or modify the task: only its owner may.
 * Pure, so it can be applied wherever a task is loaded by id.
 */
export function canAct(
  principal: Pick<RequestUser, 'userId'>,
  task: Pick<Task, 'ownerId'>,
): boolean {
  return task.ownerId === principal.userId;
}
