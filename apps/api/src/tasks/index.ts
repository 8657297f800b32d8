export { TasksModule } from './tasks.module';
export { TasksService } from './tasks.service';
export { canAct } from './policies/task.policy';
