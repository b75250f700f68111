import { vi } from 'vitest';
import { analysisResultSchema } from '../../src/agents/schemas';
import analysisFixture from '../../src/agents/placeholders/analysis.json';
import type { AgentCollaborators } from '../../src/agents/types';
import type { Employee } from '../../src/db/entities/employee.entity';
import type { Interview } from '../../src/db/entities/interview.entity';
import type {
    AnalysisResult,
    DepartmentBenchmarks,
    EmployeeProfile,
    GeneratedQuestion,
    JobRequirements
} from '../../src/types/interview';

/**
 * Logger stub whose `child` hands back the same stub, so assertions see
 * every call whatever bindings were added.
 */
export function createMockLogger() {
    const logger = {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn(),
        child: vi.fn()
    };
    logger.child.mockReturnValue(logger);
    return logger;
}

export function buildProfile(overrides: Partial<EmployeeProfile> = {}): EmployeeProfile {
    return {
        id: 'emp-1',
        name: 'Jordan Lee',
        position: 'Software Engineer',
        department: 'engineering',
        level: 'mid',
        experience_years: 4,
        skills: ['TypeScript', 'SQL'],
        recent_performance: { date: '2024-06-30', rating: 4, notes: 'Consistent delivery' },
        career_goals: ['Tech lead'],
        ...overrides
    };
}

export function buildQuestion(n: number, overrides: Partial<GeneratedQuestion> = {}): GeneratedQuestion {
    return {
        id: `q_${n}`,
        question_text: `Question text ${n}`,
        question_type: 'technical',
        category: 'problem_solving',
        rationale: 'Checks problem solving',
        weight: 1,
        expected_elements: ['example'],
        ...overrides
    };
}

export function buildAnalysis(): AnalysisResult {
    return analysisResultSchema.parse(analysisFixture);
}

export const sampleRequirements: JobRequirements = {
    required_skills: ['TypeScript', 'SQL'],
    preferred_skills: ['Docker'],
    experience_level: '2-5 years',
    competencies: ['Problem Solving']
};

export const sampleBenchmarks: DepartmentBenchmarks = { average_score: 7, top_quartile: 8.5 };

export function createCollaborators(profile: EmployeeProfile | null = buildProfile()) {
    const logger = createMockLogger();
    const collaborators = {
        directory: {
            getEmployeeProfile: vi.fn().mockResolvedValue(profile),
            getJobRequirements: vi.fn().mockResolvedValue(sampleRequirements)
        },
        benchmarks: {
            getDepartmentBenchmarks: vi.fn().mockResolvedValue(sampleBenchmarks)
        },
        generator: {
            generate: vi.fn().mockResolvedValue('generated text')
        },
        logger
    } satisfies AgentCollaborators;
    return collaborators;
}

/**
 * Stand-in for a TypeORM repository. `create` echoes its input and `save`
 * resolves to what it was given unless a test says otherwise.
 */
export function createRepositoryStub() {
    return {
        findOne: vi.fn().mockResolvedValue(null),
        find: vi.fn().mockResolvedValue([]),
        count: vi.fn().mockResolvedValue(0),
        create: vi.fn().mockImplementation((entity: object) => ({ ...entity })),
        save: vi.fn().mockImplementation(async (entity: object) => entity),
        delete: vi.fn().mockResolvedValue({ raw: [], affected: 0 })
    };
}

export function buildEmployee(overrides: Partial<Employee> = {}): Employee {
    return {
        id: 'emp-1',
        name: 'Jordan Lee',
        email: 'jordan.lee@example.com',
        position: 'Software Engineer',
        department: 'engineering',
        level: 'mid',
        experience_years: 4,
        skills: ['TypeScript', 'SQL'],
        performance_ratings: [],
        career_goals: ['Tech lead'],
        manager_id: null,
        hire_date: '2021-03-01',
        salary: null,
        created_at: new Date('2024-01-01T00:00:00.000Z'),
        updated_at: new Date('2024-01-01T00:00:00.000Z'),
        deleted_at: null,
        ...overrides
    };
}

export function buildInterview(overrides: Partial<Interview> = {}): Interview {
    return {
        id: 'int-1',
        employee_id: 'emp-1',
        employee: buildEmployee(),
        interview_type: 'performance_review',
        status: 'scheduled',
        scheduled_date: new Date('2024-07-01T09:00:00.000Z'),
        questions: [],
        responses: {},
        duration_minutes: 45,
        notes: null,
        overall_score: null,
        created_at: new Date('2024-06-20T00:00:00.000Z'),
        updated_at: new Date('2024-06-20T00:00:00.000Z'),
        ...overrides
    };
}
