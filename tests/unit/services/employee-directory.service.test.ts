import { describe, it, expect, beforeEach } from 'vitest';
import { IsNull } from 'typeorm';
import { EmployeeRepository } from '../../../src/repositories/employee.repository';
import { QuestionRepository } from '../../../src/repositories/question.repository';
import {
    DEFAULT_JOB_REQUIREMENTS,
    EmployeeDirectoryService,
    latestRating,
    toEmployeeProfile
} from '../../../src/services/employee-directory.service';
import type { JobRequirementsEntry } from '../../../src/services/employee-directory.service';
import { ConfigurationError } from '../../../src/utils/errors';
import { buildEmployee, buildQuestion, createMockLogger, createRepositoryStub } from '../../helpers/fixtures';

const catalog: JobRequirementsEntry[] = [
    {
        position: 'Software Engineer',
        department: 'engineering',
        required_skills: ['TypeScript'],
        preferred_skills: ['Docker'],
        experience_level: '2-5 years',
        competencies: ['Problem Solving']
    }
];

describe('Employee Directory Service', () => {
    let employeeStore: ReturnType<typeof createRepositoryStub>;
    let questionStore: ReturnType<typeof createRepositoryStub>;
    let logger: ReturnType<typeof createMockLogger>;
    let service: EmployeeDirectoryService;

    beforeEach(() => {
        employeeStore = createRepositoryStub();
        questionStore = createRepositoryStub();
        logger = createMockLogger();
        service = new EmployeeDirectoryService(
            new EmployeeRepository(employeeStore, logger),
            new QuestionRepository(questionStore, logger),
            catalog,
            logger
        );
    });

    describe('latestRating', () => {
        it('should pick the latest date, the first one on a tie', () => {
            const ratings = [
                { date: '2024-01-15', rating: 3 },
                { date: '2024-06-30', rating: 4 },
                { date: '2024-06-30', rating: 5 }
            ];
            expect(latestRating(ratings)).toEqual({ date: '2024-06-30', rating: 4 });
        });

        it('should return null without ratings', () => {
            expect(latestRating([])).toBeNull();
        });
    });

    describe('toEmployeeProfile', () => {
        it('should project the employee into a profile snapshot', () => {
            const employee = buildEmployee({
                performance_ratings: [{ date: '2024-03-31', rating: 4, reviewer: 'Sam' }]
            });

            expect(toEmployeeProfile(employee)).toEqual({
                id: 'emp-1',
                name: 'Jordan Lee',
                position: 'Software Engineer',
                department: 'engineering',
                level: 'mid',
                experience_years: 4,
                skills: ['TypeScript', 'SQL'],
                recent_performance: { date: '2024-03-31', rating: 4, reviewer: 'Sam' },
                career_goals: ['Tech lead']
            });
        });

        it('should copy lists so the profile cannot change the employee', () => {
            const employee = buildEmployee();
            const profile = toEmployeeProfile(employee);
            profile.skills.push('Go');

            expect(employee.skills).toEqual(['TypeScript', 'SQL']);
        });
    });

    describe('getEmployeeProfile', () => {
        it('should look up active employees only', async () => {
            employeeStore.findOne.mockResolvedValue(buildEmployee());

            const profile = await service.getEmployeeProfile('emp-1');

            expect(profile?.name).toBe('Jordan Lee');
            expect(employeeStore.findOne).toHaveBeenCalledWith({ where: { id: 'emp-1', deleted_at: IsNull() } });
        });

        it('should return null for an unknown employee', async () => {
            expect(await service.getEmployeeProfile('emp-missing')).toBeNull();
        });
    });

    describe('getJobRequirements', () => {
        it('should match position and department case-insensitively', async () => {
            expect(await service.getJobRequirements(' software engineer', 'ENGINEERING')).toEqual({
                required_skills: ['TypeScript'],
                preferred_skills: ['Docker'],
                experience_level: '2-5 years',
                competencies: ['Problem Solving']
            });
        });

        it('should fall back to the defaults', async () => {
            expect(await service.getJobRequirements('Astronaut', 'operations')).toEqual(DEFAULT_JOB_REQUIREMENTS);
            expect(logger.debug).toHaveBeenCalledWith(
                { position: 'Astronaut', department: 'operations' },
                'No job requirements in catalog, using defaults'
            );
        });

        it('should hand out copies', async () => {
            const first = await service.getJobRequirements('Software Engineer', 'engineering');
            first.required_skills.push('COBOL');

            const second = await service.getJobRequirements('Software Engineer', 'engineering');
            expect(second.required_skills).toEqual(['TypeScript']);
        });
    });

    describe('saveQuestionBank', () => {
        it('should store each question with its targets', async () => {
            const saved = await service.saveQuestionBank([buildQuestion(1), buildQuestion(2)], {
                position: 'Software Engineer',
                department: 'engineering',
                level: 'mid'
            });

            expect(saved).toHaveLength(2);
            expect(questionStore.save).toHaveBeenCalledTimes(2);
            expect(questionStore.save).toHaveBeenNthCalledWith(1, {
                question_text: 'Question text 1',
                question_type: 'technical',
                category: 'problem_solving',
                difficulty: 'medium',
                target_positions: ['Software Engineer'],
                target_departments: ['engineering'],
                target_levels: ['mid'],
                is_active: true
            });
        });

        it('should leave targets empty when none are given', async () => {
            await service.saveQuestionBank([buildQuestion(1)]);

            expect(questionStore.save).toHaveBeenCalledWith(expect.objectContaining({
                target_positions: [],
                target_departments: [],
                target_levels: []
            }));
        });
    });

    describe('create', () => {
        it('should load the bundled catalog', async () => {
            const loaded = await EmployeeDirectoryService.create(
                new EmployeeRepository(employeeStore, logger),
                new QuestionRepository(questionStore, logger),
                'config/job-requirements.json',
                logger
            );

            const requirements = await loaded.getJobRequirements('Software Engineer', 'engineering');
            expect(requirements.experience_level).toBe('2-5 years');
        });

        it('should fail with a ConfigurationError for a missing catalog', async () => {
            await expect(EmployeeDirectoryService.create(
                new EmployeeRepository(employeeStore, logger),
                new QuestionRepository(questionStore, logger),
                'config/does-not-exist.json',
                logger
            )).rejects.toBeInstanceOf(ConfigurationError);
        });
    });
});
