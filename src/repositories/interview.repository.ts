import { Between, LessThanOrEqual, MoreThanOrEqual } from 'typeorm';
import type { FindOptionsWhere } from 'typeorm';
import type { ILogger } from '../config/logger';
import type { Interview } from '../db/entities/interview.entity';
import type { IRepository } from '../db/interfaces';
import { InterviewStatus, canTransition } from '../types/interview';
import type { GeneratedQuestion, InterviewType, ResponseMap } from '../types/interview';
import { ValidationError } from '../utils/errors';
import { BaseRepository } from './base.repository';

export interface InterviewFilters {
    employee_id?: string;
    status?: InterviewStatus;
    interview_type?: InterviewType;
    department?: string;
    from?: Date;
    to?: Date;
}

function scheduledBetween(from?: Date, to?: Date): FindOptionsWhere<Interview> {
    if (from && to) return { scheduled_date: Between(from, to) };
    if (from) return { scheduled_date: MoreThanOrEqual(from) };
    if (to) return { scheduled_date: LessThanOrEqual(to) };
    return {};
}

/**
 * Interview Repository
 *
 * Lists are newest first. Status changes go through `updateStatus`, which
 * rejects anything but scheduled → completed | cancelled.
 */
export class InterviewRepository extends BaseRepository<Interview> {
    constructor(repository: IRepository<Interview>, logger: ILogger) {
        super(repository, {
            table: 'interviews',
            byId: id => ({ id }),
            order: { created_at: 'DESC' }
        }, logger);
    }

    async findByEmployee(employeeId: string): Promise<Interview[]> {
        return this.findWhere({ employee_id: employeeId });
    }

    async findByStatus(status: InterviewStatus): Promise<Interview[]> {
        return this.findWhere({ status });
    }

    async findByDepartment(department: string): Promise<Interview[]> {
        return this.findWhere({ employee: { department } });
    }

    async findRecent(since: Date): Promise<Interview[]> {
        return this.findWhere({ created_at: MoreThanOrEqual(since) });
    }

    async findByDateRange(start: Date, end: Date): Promise<Interview[]> {
        return this.findWhere(scheduledBetween(start, end));
    }

    async findPending(): Promise<Interview[]> {
        return this.findByStatus(InterviewStatus.SCHEDULED);
    }

    async findCompleted(limit: number = 50): Promise<Interview[]> {
        return this.findWhere({ status: InterviewStatus.COMPLETED }, { take: limit });
    }

    async findFiltered(filters: InterviewFilters, limit: number = 100, offset: number = 0): Promise<Interview[]> {
        return this.findWhere({
            ...(filters.employee_id ? { employee_id: filters.employee_id } : {}),
            ...(filters.status ? { status: filters.status } : {}),
            ...(filters.interview_type ? { interview_type: filters.interview_type } : {}),
            ...(filters.department ? { employee: { department: filters.department } } : {}),
            ...scheduledBetween(filters.from, filters.to)
        }, { take: limit, skip: offset });
    }

    /**
     * Move an interview to `status`. Returns null when the interview does not
     * exist; throws ValidationError for a transition that is not allowed.
     */
    async updateStatus(id: string, status: InterviewStatus): Promise<Interview | null> {
        const interview = await this.findById(id);
        if (!interview) {
            return null;
        }
        if (!canTransition(interview.status, status)) {
            throw new ValidationError(`Cannot move interview from ${interview.status} to ${status}`, {
                fields: ['status'],
                details: { interview_id: id, from: interview.status, to: status }
            });
        }
        return this.run('updateStatus', () => this.repository.save({ ...interview, status }));
    }

    async recordQuestions(id: string, questions: GeneratedQuestion[]): Promise<Interview | null> {
        return this.update(id, { questions });
    }

    async recordResponses(id: string, responses: ResponseMap): Promise<Interview | null> {
        const interview = await this.findById(id);
        if (!interview) {
            return null;
        }
        if (interview.status !== InterviewStatus.SCHEDULED) {
            throw new ValidationError(`Interview ${id} is ${interview.status} and no longer takes responses`, {
                fields: ['status'],
                details: { interview_id: id }
            });
        }
        return this.run('recordResponses', () => this.repository.save({ ...interview, responses }));
    }

    async recordScore(id: string, overallScore: number): Promise<Interview | null> {
        return this.update(id, { overall_score: overallScore });
    }
}
