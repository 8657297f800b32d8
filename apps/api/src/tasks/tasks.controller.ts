import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import type { Request } from 'express';
import { BearerAuthGuard } from '../auth/guards';
import { CurrentUser } from '../auth/decorators';
import type { RequestUser } from '../auth/interfaces';
import { Throttle, ThrottleGuard } from '../throttle';
import { PaginationQueryDto, SimplePage, mapPage } from '../common/pagination';
import type { MessageResponseDto } from '../common/dto/message-response.dto';
import { TasksService } from './tasks.service';
import { CreateTaskDto, TaskResponseDto, UpdateTaskDto } from './dto';

/** A non-numeric id can never match a task, so it is a 404 like any unknown id */
const TASK_ID_PIPE = new ParseIntPipe({ errorHttpStatusCode: HttpStatus.NOT_FOUND });

/**
 * REST controller for the authenticated user's tasks.
 *
 * Routes:
 *   GET    /tasks       simple-paginated list (?page, ?pageSize)
 *   POST   /tasks       create
 *   GET    /tasks/:id   show
 *   PUT    /tasks/:id   update state
 *   DELETE /tasks/:id   delete
 *
 * All routes require a bearer token and share the `api` throttle budget.
 */
@Controller('tasks')
@UseGuards(BearerAuthGuard, ThrottleGuard)
@Throttle('api')
export class TasksController {
  constructor(private readonly tasksService: TasksService) {}

  @Get()
  async list(
    @CurrentUser() user: RequestUser,
    @Query() query: PaginationQueryDto,
    @Req() req: Request,
  ): Promise<SimplePage<TaskResponseDto>> {
    const page = await this.tasksService.list(user, query.page, query.pageSize, req.path);
    return mapPage(page, TaskResponseDto.fromEntity);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @CurrentUser() user: RequestUser,
    @Body() dto: CreateTaskDto,
  ): Promise<TaskResponseDto> {
    return TaskResponseDto.fromEntity(await this.tasksService.create(user, dto.name));
  }

  @Get(':id')
  async show(
    @CurrentUser() user: RequestUser,
    @Param('id', TASK_ID_PIPE) id: number,
  ): Promise<TaskResponseDto> {
    return TaskResponseDto.fromEntity(await this.tasksService.findOne(user, id));
  }

  @Put(':id')
  async update(
    @CurrentUser() user: RequestUser,
    @Param('id', TASK_ID_PIPE) id: number,
    @Body() dto: UpdateTaskDto,
  ): Promise<TaskResponseDto> {
    return TaskResponseDto.fromEntity(await this.tasksService.updateState(user, id, dto.state));
  }

  @Delete(':id')
  async remove(
    @CurrentUser() user: RequestUser,
    @Param('id', TASK_ID_PIPE) id: number,
  ): Promise<MessageResponseDto> {
    await this.tasksService.delete(user, id);
    return { message: 'Task deleted' };
  }
}
