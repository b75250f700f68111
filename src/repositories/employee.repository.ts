import { ArrayOverlap, In, IsNull } from 'typeorm';
import type { ILogger } from '../config/logger';
import type { Employee } from '../db/entities/employee.entity';
import type { IRepository } from '../db/interfaces';
import { isDeleted, notDeleted, restore as restoreRecord, softDelete as softDeleteRecord } from '../db/soft-delete';
import { EMPLOYEE_LEVEL_ORDER } from '../types/interview';
import type { EmployeeLevel, PerformanceRating } from '../types/interview';
import { ValidationError } from '../utils/errors';
import { BaseRepository } from './base.repository';

export type NewPerformanceRating = Omit<PerformanceRating, 'date'> & { date?: string };

/**
 * Employee Repository
 *
 * Every lookup hides soft-deleted employees; `delete` soft deletes and
 * `restore` brings a row back.
 */
export class EmployeeRepository extends BaseRepository<Employee> {
    constructor(repository: IRepository<Employee>, logger: ILogger) {
        super(repository, {
            table: 'employees',
            byId: id => ({ id, deleted_at: IsNull() }),
            scope: notDeleted,
            order: { name: 'ASC' }
        }, logger);
    }

    async findByEmail(email: string): Promise<Employee | null> {
        return this.run('findByEmail', () => this.repository.findOne({ where: { email, ...notDeleted } }));
    }

    async findByManager(managerId: string): Promise<Employee[]> {
        return this.findWhere({ manager_id: managerId, ...notDeleted });
    }

    /**
     * Employees holding at least one of the given skills.
     */
    async findBySkills(skills: string[]): Promise<Employee[]> {
        if (skills.length === 0) {
            return [];
        }
        return this.findWhere({ skills: ArrayOverlap(skills), ...notDeleted });
    }

    async findByLevelRange(minLevel: EmployeeLevel, maxLevel: EmployeeLevel): Promise<Employee[]> {
        const from = EMPLOYEE_LEVEL_ORDER.indexOf(minLevel);
        const to = EMPLOYEE_LEVEL_ORDER.indexOf(maxLevel);
        if (from > to) {
            throw new ValidationError(`Level range is empty: ${minLevel} is above ${maxLevel}`, {
                fields: ['min_level', 'max_level']
            });
        }
        return this.findWhere({ level: In(EMPLOYEE_LEVEL_ORDER.slice(from, to + 1)), ...notDeleted });
    }

    async getTeamMembers(department: string, level?: EmployeeLevel): Promise<Employee[]> {
        return this.findWhere({ department, ...(level ? { level } : {}), ...notDeleted });
    }

    /**
     * Append a rating to the employee's history. The date (YYYY-MM-DD) defaults
     * to the UTC day of `now`.
     */
    async addPerformanceRating(
        id: string,
        rating: NewPerformanceRating,
        now: Date = new Date()
    ): Promise<Employee | null> {
        const employee = await this.findById(id);
        if (!employee) {
            return null;
        }
        const entry: PerformanceRating = { ...rating, date: rating.date ?? now.toISOString().slice(0, 10) };
        return this.run('addPerformanceRating', () =>
            this.repository.save({ ...employee, performance_ratings: [...employee.performance_ratings, entry] })
        );
    }

    async updateSkills(id: string, skills: string[]): Promise<Employee | null> {
        return this.update(id, { skills });
    }

    async delete(id: string): Promise<boolean> {
        const employee = await this.findById(id);
        if (!employee) {
            return false;
        }
        await this.run('softDelete', () => this.repository.save(softDeleteRecord(employee)));
        this.logger.info({ employeeId: id }, 'Employee soft deleted');
        return true;
    }

    async restore(id: string): Promise<Employee | null> {
        const employee = await this.run('restore', () => this.repository.findOne({ where: { id } }));
        if (!employee || !isDeleted(employee)) {
            return employee;
        }
        return this.run('restore', () => this.repository.save(restoreRecord(employee)));
    }
}
