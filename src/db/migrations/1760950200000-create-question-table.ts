import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateQuestionTable1760950200000 implements MigrationInterface {
    name = 'CreateQuestionTable1760950200000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "questions" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "question_text" text NOT NULL, "question_type" character varying(50) NOT NULL, "category" character varying(50) NOT NULL, "difficulty" character varying(20) NOT NULL DEFAULT 'medium', "target_positions" text array NOT NULL DEFAULT '{}', "target_departments" text array NOT NULL DEFAULT '{}', "target_levels" text array NOT NULL DEFAULT '{}', "is_active" boolean NOT NULL DEFAULT true, "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_questions_id" PRIMARY KEY ("id"))`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP TABLE "questions"`);
    }

}
