import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateEvaluationTable1760950300000 implements MigrationInterface {
    name = 'CreateEvaluationTable1760950300000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "evaluations" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "interview_id" uuid NOT NULL, "employee_id" uuid NOT NULL, "scores" jsonb NOT NULL, "overall_score" double precision NOT NULL, "strengths" text array NOT NULL DEFAULT '{}', "areas_for_improvement" text array NOT NULL DEFAULT '{}', "recommendations" jsonb NOT NULL DEFAULT '[]', "confidence_level" double precision NOT NULL, "detailed_analysis" jsonb NOT NULL, "created_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_evaluations_interview_id" UNIQUE ("interview_id"), CONSTRAINT "PK_evaluations_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_evaluations_employee_id" ON "evaluations" ("employee_id")`);
        await queryRunner.query(`ALTER TABLE "evaluations" ADD CONSTRAINT "FK_evaluations_interview_id" FOREIGN KEY ("interview_id") REFERENCES "interviews"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "evaluations" DROP CONSTRAINT "FK_evaluations_interview_id"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_evaluations_employee_id"`);
        await queryRunner.query(`DROP TABLE "evaluations"`);
    }

}
