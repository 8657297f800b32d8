import { Module } from '@nestjs/common';
import { DatabaseModule } from '@taskapi/database';
import { ThrottleModule } from '../throttle';
import { TasksService } from './tasks.service';
import { TasksController } from './tasks.controller';

/**
 * TasksModule: the task store and its REST routes.
 *
 * Authentication comes from the globally registered bearer strategy;
 * ThrottleModule supplies the guard's rate limiter.
 */
@Module({
  imports: [DatabaseModule.forFeature(), ThrottleModule],
  controllers: [TasksController],
  providers: [TasksService],
})
export class TasksModule {}
