import { DataSource } from "typeorm";
import type { DatabaseConfig } from "../config/env";
import { Employee } from "./entities/employee.entity";
import { Evaluation } from "./entities/evaluation.entity";
import { Interview } from "./entities/interview.entity";
import { Question } from "./entities/question.entity";
import { CreateEmployeeTable1760950000000 } from "./migrations/1760950000000-create-employee-table";
import { CreateInterviewTable1760950100000 } from "./migrations/1760950100000-create-interview-table";
import { CreateQuestionTable1760950200000 } from "./migrations/1760950200000-create-question-table";
import { CreateEvaluationTable1760950300000 } from "./migrations/1760950300000-create-evaluation-table";

export const entities = [Employee, Interview, Question, Evaluation];

export const migrations = [
    CreateEmployeeTable1760950000000,
    CreateInterviewTable1760950100000,
    CreateQuestionTable1760950200000,
    CreateEvaluationTable1760950300000
];

/**
 * Build the PostgreSQL data source. The caller owns its lifecycle:
 * `initialize()` at start-up, `destroy()` on shutdown.
 *
 * Pool settings are handed to pg through `extra`.
 */
export function createDataSource(config: DatabaseConfig): DataSource {
    return new DataSource({
        type: "postgres",
        url: config.url,
        synchronize: false,
        logging: config.logging,
        uuidExtension: "pgcrypto",
        entities,
        migrations,
        extra: {
            max: config.poolSize,
            idleTimeoutMillis: config.idleTimeoutMs,
            connectionTimeoutMillis: config.connectionTimeoutMs
        }
    });
}
