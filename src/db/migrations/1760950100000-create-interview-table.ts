import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateInterviewTable1760950100000 implements MigrationInterface {
    name = 'CreateInterviewTable1760950100000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "interviews" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "employee_id" uuid NOT NULL, "interview_type" character varying(50) NOT NULL, "status" character varying(20) NOT NULL DEFAULT 'scheduled', "scheduled_date" TIMESTAMP NOT NULL, "questions" jsonb NOT NULL DEFAULT '[]', "responses" jsonb NOT NULL DEFAULT '{}', "duration_minutes" integer, "notes" text, "overall_score" double precision, "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_interviews_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_interviews_employee_id" ON "interviews" ("employee_id")`);
        await queryRunner.query(`CREATE INDEX "IDX_interviews_status" ON "interviews" ("status")`);
        await queryRunner.query(`ALTER TABLE "interviews" ADD CONSTRAINT "FK_interviews_employee_id" FOREIGN KEY ("employee_id") REFERENCES "employees"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "interviews" DROP CONSTRAINT "FK_interviews_employee_id"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_interviews_status"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_interviews_employee_id"`);
        await queryRunner.query(`DROP TABLE "interviews"`);
    }

}
