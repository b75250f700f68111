import { MoreThanOrEqual } from 'typeorm';
import type { ILogger } from '../config/logger';
import type { Evaluation } from '../db/entities/evaluation.entity';
import type { IRepository } from '../db/interfaces';
import { BaseRepository } from './base.repository';

export type EvaluationData = Omit<Evaluation, 'id' | 'created_at' | 'interview'>;

const DAY_MS = 24 * 60 * 60 * 1000;

export class EvaluationRepository extends BaseRepository<Evaluation> {
    constructor(repository: IRepository<Evaluation>, logger: ILogger) {
        super(repository, {
            table: 'evaluations',
            byId: id => ({ id }),
            order: { created_at: 'DESC' }
        }, logger);
    }

    async findByInterview(interviewId: string): Promise<Evaluation | null> {
        return this.run('findByInterview', () => this.repository.findOne({ where: { interview_id: interviewId } }));
    }

    async findByEmployee(employeeId: string): Promise<Evaluation[]> {
        return this.findWhere({ employee_id: employeeId });
    }

    async findRecent(days: number = 30, now: Date = new Date()): Promise<Evaluation[]> {
        return this.findWhere({ created_at: MoreThanOrEqual(new Date(now.getTime() - days * DAY_MS)) });
    }

    /**
     * One evaluation per interview: a second write for the same interview
     * replaces the first.
     */
    async upsertForInterview(data: EvaluationData): Promise<Evaluation> {
        const existing = await this.findByInterview(data.interview_id);
        if (!existing) {
            return this.create(data);
        }
        return this.run('upsert', () => this.repository.save({ ...existing, ...data }));
    }
}
