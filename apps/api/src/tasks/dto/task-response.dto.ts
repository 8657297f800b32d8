import type { Task } from '@taskapi/database';

export class TaskResponseDto {
  id: number;
  name: string;
  state: string;
  ownerId: string;
  createdAt: Date;
  updatedAt: Date;

  private constructor(task: Task) {
    this.id = task.id;
    this.name = task.name;
    this.state = task.state;
    this.ownerId = task.ownerId;
    this.createdAt = task.createdAt;
    this.updatedAt = task.updatedAt;
  }

  static fromEntity(task: Task): TaskResponseDto {
    return new TaskResponseDto(task);
  }
}
