import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitialSchema1776000000000 implements MigrationInterface {
  name = 'InitialSchema1776000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    // 1. Enums
    await queryRunner.query(
      `CREATE TYPE "public"."users_role_enum" AS ENUM('player', 'admin')`,
    );
    await queryRunner.query(
      `CREATE TYPE "public"."users_skilllevel_enum" AS ENUM('beginner', 'intermediate', 'advanced', 'professional')`,
    );
    await queryRunner.query(
      `CREATE TYPE "public"."courts_surfacetype_enum" AS ENUM('glass', 'wall', 'mixed')`,
    );
    await queryRunner.query(
      `CREATE TYPE "public"."reservations_status_enum" AS ENUM('confirmed', 'cancelled', 'completed', 'no_show')`,
    );

    // 2. users
    await queryRunner.query(
      `CREATE TABLE "users" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "email" character varying(120) NOT NULL,
        "passwordHash" character varying(120) NOT NULL,
        "role" "public"."users_role_enum" NOT NULL DEFAULT 'player',
        "displayName" character varying(80),
        "skillLevel" "public"."users_skilllevel_enum",
        "phone" character varying(20),
        "active" boolean NOT NULL DEFAULT true,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_users" PRIMARY KEY ("id")
      )`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_users_email" ON "users" ("email")`,
    );

    // 3. courts
    await queryRunner.query(
      `CREATE TABLE "courts" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "name" character varying(100) NOT NULL,
        "surfaceType" "public"."courts_surfacetype_enum" NOT NULL DEFAULT 'glass',
        "hourlyRate" numeric(8,2) NOT NULL,
        "description" text,
        "playerCapacity" integer NOT NULL DEFAULT 4,
        "active" boolean NOT NULL DEFAULT true,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_courts" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_courts_player_capacity" CHECK ("playerCapacity" BETWEEN 2 AND 6),
        CONSTRAINT "CHK_courts_hourly_rate" CHECK ("hourlyRate" >= 0)
      )`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_courts_name" ON "courts" ("name")`,
    );

    // 4. reservations
    await queryRunner.query(
      `CREATE TABLE "reservations" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "courtId" uuid NOT NULL,
        "playerId" uuid NOT NULL,
        "date" date NOT NULL,
        "startTime" character varying(5) NOT NULL,
        "endTime" character varying(5) NOT NULL,
        "status" "public"."reservations_status_enum" NOT NULL DEFAULT 'confirmed',
        "totalPrice" numeric(8,2) NOT NULL,
        "notes" text,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_reservations" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_reservations_time_range" CHECK ("endTime" > "startTime"),
        CONSTRAINT "FK_reservations_courtId" FOREIGN KEY ("courtId") REFERENCES "courts"("id") ON DELETE RESTRICT,
        CONSTRAINT "FK_reservations_playerId" FOREIGN KEY ("playerId") REFERENCES "users"("id") ON DELETE RESTRICT
      )`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_reservations_court_date_status" ON "reservations" ("courtId", "date", "status")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_reservations_player_date" ON "reservations" ("playerId", "date")`,
    );

    // Unique partial index: one CONFIRMED reservation per court slot
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_reservations_confirmed_slot" ON "reservations" ("courtId", "date", "startTime") WHERE "status" = 'confirmed'`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX "public"."UQ_reservations_confirmed_slot"`);
    await queryRunner.query(`DROP INDEX "public"."IDX_reservations_player_date"`);
    await queryRunner.query(
      `DROP INDEX "public"."IDX_reservations_court_date_status"`,
    );
    await queryRunner.query(`DROP TABLE "reservations"`);
    await queryRunner.query(`DROP INDEX "public"."UQ_courts_name"`);
    await queryRunner.query(`DROP TABLE "courts"`);
    await queryRunner.query(`DROP INDEX "public"."UQ_users_email"`);
    await queryRunner.query(`DROP TABLE "users"`);
    await queryRunner.query(`DROP TYPE "public"."reservations_status_enum"`);
    await queryRunner.query(`DROP TYPE "public"."courts_surfacetype_enum"`);
    await queryRunner.query(`DROP TYPE "public"."users_skilllevel_enum"`);
    await queryRunner.query(`DROP TYPE "public"."users_role_enum"`);
  }
}
