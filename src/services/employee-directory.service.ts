import { z } from 'zod';
import type { IEmployeeDirectory } from '../agents/types';
import type { ILogger } from '../config/logger';
import type { Employee } from '../db/entities/employee.entity';
import type { Question } from '../db/entities/question.entity';
import type { EmployeeRepository } from '../repositories/employee.repository';
import type { QuestionRepository } from '../repositories/question.repository';
import { DifficultyLevel } from '../types/interview';
import type { EmployeeProfile, GeneratedQuestion, JobRequirements, PerformanceRating } from '../types/interview';
import { loadJsonCatalog } from './catalog-loader';

const jobRequirementsEntrySchema = z.object({
    position: z.string().min(1),
    department: z.string().min(1),
    required_skills: z.array(z.string()),
    preferred_skills: z.array(z.string()),
    experience_level: z.string(),
    competencies: z.array(z.string())
});

export const jobRequirementsCatalogSchema = z.array(jobRequirementsEntrySchema);

export type JobRequirementsEntry = z.infer<typeof jobRequirementsEntrySchema>;

export const DEFAULT_JOB_REQUIREMENTS: JobRequirements = {
    required_skills: [],
    preferred_skills: [],
    experience_level: 'Variable',
    competencies: ['Communication', 'Problem Solving']
};

export interface QuestionBankTarget {
    position?: string;
    department?: string;
    level?: string;
    difficulty?: DifficultyLevel;
}

/**
 * Latest rating by date; the first one wins a tie.
 */
export function latestRating(ratings: readonly PerformanceRating[]): PerformanceRating | null {
    return ratings.reduce<PerformanceRating | null>(
        (latest, rating) => (latest === null || rating.date > latest.date ? rating : latest),
        null
    );
}

export function toEmployeeProfile(employee: Employee): EmployeeProfile {
    return {
        id: employee.id,
        name: employee.name,
        position: employee.position,
        department: employee.department,
        level: employee.level,
        experience_years: employee.experience_years,
        skills: [...employee.skills],
        recent_performance: latestRating(employee.performance_ratings ?? []),
        career_goals: [...(employee.career_goals ?? [])]
    };
}

function catalogKey(position: string, department: string): string {
    return `${position.trim().toLowerCase()}|${department.trim().toLowerCase()}`;
}

/**
 * Employee Directory Service
 *
 * What the agents know about an employee: the profile snapshot, the job
 * requirements for their role and a place to keep generated questions.
 */
export class EmployeeDirectoryService implements IEmployeeDirectory {
    private readonly requirements: Map<string, JobRequirements>;

    constructor(
        private readonly employees: EmployeeRepository,
        private readonly questions: QuestionRepository,
        catalog: readonly JobRequirementsEntry[],
        private readonly logger: ILogger
    ) {
        this.requirements = new Map(
            catalog.map(({ position, department, ...requirements }) => [catalogKey(position, department), requirements])
        );
    }

    static async create(
        employees: EmployeeRepository,
        questions: QuestionRepository,
        catalogPath: string,
        logger: ILogger
    ): Promise<EmployeeDirectoryService> {
        const catalog = await loadJsonCatalog(catalogPath, jobRequirementsCatalogSchema, 'JOB_REQUIREMENTS_PATH');
        return new EmployeeDirectoryService(employees, questions, catalog, logger);
    }

    async getEmployeeProfile(employeeId: string): Promise<EmployeeProfile | null> {
        const employee = await this.employees.findById(employeeId);
        return employee ? toEmployeeProfile(employee) : null;
    }

    async getJobRequirements(position: string, department: string): Promise<JobRequirements> {
        const requirements = this.requirements.get(catalogKey(position, department));
        if (!requirements) {
            this.logger.debug({ position, department }, 'No job requirements in catalog, using defaults');
            return structuredClone(DEFAULT_JOB_REQUIREMENTS);
        }
        return structuredClone(requirements);
    }

    /**
     * Store generated questions in the question bank for reuse.
     */
    async saveQuestionBank(questions: readonly GeneratedQuestion[], target: QuestionBankTarget = {}): Promise<Question[]> {
        const saved = await this.questions.createMany(questions.map(question => ({
            question_text: question.question_text,
            question_type: question.question_type,
            category: question.category,
            difficulty: target.difficulty ?? DifficultyLevel.MEDIUM,
            target_positions: target.position ? [target.position] : [],
            target_departments: target.department ? [target.department] : [],
            target_levels: target.level ? [target.level] : [],
            is_active: true
        })));

        this.logger.info({ count: saved.length, target }, 'Questions saved to bank');
        return saved;
    }
}
