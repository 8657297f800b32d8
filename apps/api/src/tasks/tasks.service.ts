import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Task, DEFAULT_TASK_STATE, MAX_TASK_ID } from '@taskapi/database';
import type { RequestUser } from '../auth/interfaces';
import { SimplePage, pageWindow, simplePaginate } from '../common/pagination';
import { canAct } from './policies/task.policy';
import { TaskNotFoundException, TaskOwnershipException } from './exceptions';

/**
 * TasksService: CRUD over tasks, scoped to their owner.
 *
 * Reads for lists filter by ownerId in the query itself, so other users'
 * tasks are never loaded. Operations on a single task load it by id and
 * then apply canAct():
 * - no such task         → TaskNotFoundException (404), including ids
 *                           outside 1..MAX_TASK_ID, which skip the query
 * - owned by someone else → TaskOwnershipException (403), nothing written
 */
@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);

  constructor(
    @InjectRepository(Task)
    private readonly taskRepository: Repository<Task>,
  ) {}

  /**
   * The principal's tasks in insertion order, one simple page at a time.
   * An empty result is an empty page, never an error.
   */
  async list(
    principal: RequestUser,
    page: number,
    pageSize: number,
    path: string,
  ): Promise<SimplePage<Task>> {
    const { skip, take } = pageWindow({ page, perPage: pageSize });

    const rows = await this.taskRepository.find({
      where: { ownerId: principal.userId },
      order: { id: 'ASC' },
      skip,
      take,
    });

    return simplePaginate(rows, { page, perPage: pageSize, path });
  }

  async create(principal: RequestUser, name: string): Promise<Task> {
    const task = await this.taskRepository.save(
      this.taskRepository.create({
        name,
        state: DEFAULT_TASK_STATE,
        ownerId: principal.userId,
      }),
    );

    this.logger.log(`Task ${task.id} created by user ${principal.userId}`);
    return task;
  }

  async findOne(principal: RequestUser, taskId: number): Promise<Task> {
    return this.findOwnedTask(principal, taskId);
  }

  async updateState(principal: RequestUser, taskId: number, state: string): Promise<Task> {
    const task = await this.findOwnedTask(principal, taskId);

    task.state = state;
    const saved = await this.taskRepository.save(task);

    this.logger.log(`Task ${taskId} state set to "${state}" by user ${principal.userId}`);
    return saved;
  }

  /** Permanent delete; there is no soft-delete or undo. */
  async delete(principal: RequestUser, taskId: number): Promise<void> {
    const task = await this.findOwnedTask(principal, taskId);

    await this.taskRepository.remove(task);

    this.logger.log(`Task ${taskId} deleted by user ${principal.userId}`);
  }

  // ── Private helpers ──────────────────────────────────────

  private async findOwnedTask(principal: RequestUser, taskId: number): Promise<Task> {
    if (!Number.isInteger(taskId) || taskId < 1 || taskId > MAX_TASK_ID) {
      throw new TaskNotFoundException(taskId);
    }

    const task = await this.taskRepository.findOne({ where: { id: taskId } });

    if (!task) {
      throw new TaskNotFoundException(taskId);
    }

    if (!canAct(principal, task)) {
      this.logger.warn(`User ${principal.userId} denied access to task ${taskId}`);
      throw new TaskOwnershipException(taskId);
    }

    return task;
  }
}
