import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial schema migration: creates users, tasks and access_tokens.
 *
 * Hand-written to match the entity definitions, since migration:generate
 * requires a running database connection. PostgreSQL-specific SQL.
 */
export class InitialSchema1760000000000 implements MigrationInterface {
  name = 'InitialSchema1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    // ── Users table ────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "users" (
        "id"            uuid NOT NULL DEFAULT uuid_generate_v4(),
        "name"          varchar(255) NOT NULL,
        "email"         varchar(255) NOT NULL,
        "password_hash" varchar(255) NOT NULL,
        "avatar_path"   varchar(1024),
        "created_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_users" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_users_email" UNIQUE ("email"),
        CONSTRAINT "UQ_users_name" UNIQUE ("name")
      )
    `);

    // ── Tasks table ────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "tasks" (
        "id"          SERIAL NOT NULL,
        "name"        varchar(255) NOT NULL,
        "state"       varchar(255) NOT NULL DEFAULT 'active',
        "owner_id"    uuid NOT NULL,
        "created_at"  TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"  TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_tasks" PRIMARY KEY ("id"),
        CONSTRAINT "FK_tasks_owner" FOREIGN KEY ("owner_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_tasks_owner_id_id" ON "tasks" ("owner_id", "id")`,
    );

    // ── Access tokens table ────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "access_tokens" (
        "id"            uuid NOT NULL DEFAULT uuid_generate_v4(),
        "user_id"       uuid NOT NULL,
        "name"          varchar(255) NOT NULL,
        "token_hash"    char(64) NOT NULL,
        "last_used_at"  TIMESTAMPTZ,
        "expires_at"    TIMESTAMPTZ,
        "created_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_access_tokens" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_access_tokens_token_hash" UNIQUE ("token_hash"),
        CONSTRAINT "FK_access_tokens_user" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_access_tokens_user_id" ON "access_tokens" ("user_id")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "access_tokens"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "tasks"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "users"`);
  }
}
