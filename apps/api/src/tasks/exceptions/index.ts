export { TaskNotFoundException, TaskOwnershipException } from './task.exceptions';
