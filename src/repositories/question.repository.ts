import { ArrayContains, ILike } from 'typeorm';
import type { DeepPartial, FindOptionsWhere } from 'typeorm';
import type { ILogger } from '../config/logger';
import type { Question } from '../db/entities/question.entity';
import type { IRepository } from '../db/interfaces';
import type { DifficultyLevel, QuestionCategory, QuestionType } from '../types/interview';
import { BaseRepository } from './base.repository';

export interface QuestionFilters {
    question_type?: QuestionType;
    category?: QuestionCategory;
    difficulty?: DifficultyLevel;
    position?: string;
    department?: string;
}

const active = { is_active: true };

function escapeLike(term: string): string {
    return term.replace(/[\\%_]/g, match => `\\${match}`);
}

/**
 * Question bank repository. Only active questions are ever listed;
 * deleting a question deactivates it.
 */
export class QuestionRepository extends BaseRepository<Question> {
    constructor(repository: IRepository<Question>, logger: ILogger) {
        super(repository, {
            table: 'questions',
            byId: id => ({ id }),
            scope: active,
            order: { created_at: 'DESC' }
        }, logger);
    }

    // Matches any of position, department or level
    async findForPosition(position: string, department: string, level: string): Promise<Question[]> {
        return this.findWhere([
            { target_positions: ArrayContains([position]), ...active },
            { target_departments: ArrayContains([department]), ...active },
            { target_levels: ArrayContains([level]), ...active }
        ]);
    }

    async findFiltered(filters: QuestionFilters, limit: number = 20): Promise<Question[]> {
        const where: FindOptionsWhere<Question> = {
            ...active,
            ...(filters.question_type ? { question_type: filters.question_type } : {}),
            ...(filters.category ? { category: filters.category } : {}),
            ...(filters.difficulty ? { difficulty: filters.difficulty } : {}),
            ...(filters.position ? { target_positions: ArrayContains([filters.position]) } : {}),
            ...(filters.department ? { target_departments: ArrayContains([filters.department]) } : {})
        };
        return this.findWhere(where, { take: limit });
    }

    async search(term: string): Promise<Question[]> {
        return this.findWhere({ question_text: ILike(`%${escapeLike(term)}%`), ...active });
    }

    async createMany(questions: DeepPartial<Question>[]): Promise<Question[]> {
        const saved: Question[] = [];
        for (const question of questions) {
            saved.push(await this.create(question));
        }
        return saved;
    }

    async deactivate(id: string): Promise<boolean> {
        const updated = await this.update(id, { is_active: false });
        return updated !== null;
    }

    /**
     * Up to `count` distinct questions drawn at random from the first hundred
     * matching `filters`.
     */
    async randomSample(
        count: number,
        filters: QuestionFilters = {},
        random: () => number = Math.random
    ): Promise<Question[]> {
        const pool = await this.findFiltered(filters, 100);
        const size = Math.min(count, pool.length);
        for (let i = 0; i < size; i++) {
            const j = i + Math.floor(random() * (pool.length - i));
            [pool[i], pool[j]] = [pool[j], pool[i]];
        }
        return pool.slice(0, size);
    }
}
