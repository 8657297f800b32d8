import { NotFoundException, ForbiddenException } from '@nestjs/common';

/**
 * Thrown when no task exists with the requested id, whoever owns it.
 */
export class TaskNotFoundException extends NotFoundException {
  constructor(taskId: number) {
    super(`Task with ID "${taskId}" not found`);
  }
}

/**
 * Thrown when the authenticated user acts on a task they do not own.
 * Distinct from 401: the caller is known, the action is not allowed.
 */
export class TaskOwnershipException extends ForbiddenException {
  constructor(taskId: number) {
    super(`You do not have permission to access task "${taskId}"`);
  }
}
