import { Module, DynamicModule } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from './entities/user.entity';
import { Task } from './entities/task.entity';
import { AccessToken } from './entities/access-token.entity';
import { InitialSchema1760000000000 } from './migrations/1760000000000-InitialSchema';

/** All entity classes registered in this database library */
const ENTITIES = [User, Task, AccessToken] as const;

/** Migrations in the order they must be applied */
const MIGRATIONS = [InitialSchema1760000000000] as const;

/**
 * DatabaseModule: registers all TypeORM entity repositories.
 *
 * @example
 * ```ts
 * @Module({
 *   imports: [DatabaseModule.forFeature()],
 * })
 * export class TasksModule {}
 * ```
 */
@Module({})
export class DatabaseModule {
  /**
   * Registers all entity repositories for injection.
   * Uses TypeOrmModule.forFeature under the hood.
   */
  static forFeature(): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [TypeOrmModule.forFeature([...ENTITIES])],
      exports: [TypeOrmModule],
    };
  }

  /**
   * Returns the array of all entity classes.
   * Useful for passing to TypeOrmModule.forRoot({ entities }).
   */
  static get entities(): Array<(typeof ENTITIES)[number]> {
    return [...ENTITIES];
  }

  static get migrations(): Array<(typeof MIGRATIONS)[number]> {
    return [...MIGRATIONS];
  }
}
