export { CreateTaskDto } from './create-task.dto';
export { UpdateTaskDto } from './update-task.dto';
export { TaskResponseDto } from './task-response.dto';
