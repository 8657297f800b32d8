import { config } from 'dotenv';
import { DataSource, DataSourceOptions } from 'typeorm';
import { join } from 'path';
import { DatabaseModule } from './database.module';

/**
 * Load env vars from the project root .env file.
 * Supports running from libs/database/ and from the project root.
 */
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../.env') });

/**
 * TypeORM DataSource configuration for CLI-driven migrations.
 *
 * Used by `typeorm migration:run` / `migration:revert` (see the
 * `migration:*` scripts in package.json). Dev defaults below MUST be
 * overridden in production.
 */
const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env['POSTGRES_HOST'] || 'localhost',
  port: parseInt(process.env['POSTGRES_PORT'] || '5432', 10),
  username: process.env['POSTGRES_USER'] || 'taskapi',
  password: process.env['POSTGRES_PASSWORD'] || 'taskapi_secret',
  database: process.env['POSTGRES_DB'] || 'taskapi',
  entities: DatabaseModule.entities,
  migrations: DatabaseModule.migrations,
  synchronize: false,
  logging: process.env['NODE_ENV'] !== 'production',
};

const AppDataSource = new DataSource(dataSourceOptions);

export default AppDataSource;
