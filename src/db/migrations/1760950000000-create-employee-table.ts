import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateEmployeeTable1760950000000 implements MigrationInterface {
    name = 'CreateEmployeeTable1760950000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "pgcrypto"`);
        await queryRunner.query(`CREATE TABLE "employees" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "name" character varying(255) NOT NULL, "email" character varying(255) NOT NULL, "position" character varying(255) NOT NULL, "department" character varying(50) NOT NULL, "level" character varying(20) NOT NULL, "experience_years" integer NOT NULL DEFAULT '0', "skills" text array NOT NULL DEFAULT '{}', "performance_ratings" jsonb NOT NULL DEFAULT '[]', "career_goals" text array NOT NULL DEFAULT '{}', "manager_id" uuid, "hire_date" date, "salary" numeric(12,2), "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), "deleted_at" TIMESTAMP, CONSTRAINT "UQ_employees_email" UNIQUE ("email"), CONSTRAINT "PK_employees_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_employees_department" ON "employees" ("department")`);
        await queryRunner.query(`CREATE INDEX "IDX_employees_manager_id" ON "employees" ("manager_id")`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP INDEX "public"."IDX_employees_manager_id"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_employees_department"`);
        await queryRunner.query(`DROP TABLE "employees"`);
    }

}
