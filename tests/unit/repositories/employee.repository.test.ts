import { describe, it, expect, beforeEach } from 'vitest';
import { ArrayOverlap, In, IsNull } from 'typeorm';
import { isDeleted, restore, softDelete } from '../../../src/db/soft-delete';
import { EmployeeRepository } from '../../../src/repositories/employee.repository';
import { DatabaseError, ValidationError } from '../../../src/utils/errors';
import { buildEmployee, createMockLogger, createRepositoryStub } from '../../helpers/fixtures';

describe('Soft Delete', () => {
    it('should mark and clear deleted_at on copies', () => {
        const employee = buildEmployee();
        const at = new Date('2024-08-01T00:00:00.000Z');

        const deleted = softDelete(employee, at);
        expect(deleted.deleted_at).toBe(at);
        expect(isDeleted(deleted)).toBe(true);
        expect(employee.deleted_at).toBeNull();

        expect(isDeleted(restore(deleted))).toBe(false);
    });
});

describe('Employee Repository', () => {
    let store: ReturnType<typeof createRepositoryStub>;
    let logger: ReturnType<typeof createMockLogger>;
    let repository: EmployeeRepository;

    beforeEach(() => {
        store = createRepositoryStub();
        logger = createMockLogger();
        repository = new EmployeeRepository(store, logger);
    });

    describe('create', () => {
        it('should build and save the entity', async () => {
            const created = await repository.create({ name: 'Jordan Lee', email: 'jordan.lee@example.com' });

            expect(store.create).toHaveBeenCalledWith({ name: 'Jordan Lee', email: 'jordan.lee@example.com' });
            expect(created).toEqual({ name: 'Jordan Lee', email: 'jordan.lee@example.com' });
        });

        it('should turn a unique violation into a ValidationError', async () => {
            store.save.mockRejectedValue(Object.assign(new Error('duplicate key value'), { code: '23505' }));

            const promise = repository.create({ email: 'jordan.lee@example.com' });
            await expect(promise).rejects.toBeInstanceOf(ValidationError);
            await expect(promise).rejects.toThrow('Duplicate value in employees');
        });

        it('should wrap other driver errors in DatabaseError', async () => {
            store.save.mockRejectedValue(new Error('connection terminated'));

            const promise = repository.create({ email: 'jordan.lee@example.com' });
            await expect(promise).rejects.toBeInstanceOf(DatabaseError);
            await expect(promise).rejects.toMatchObject({
                message: 'Failed to create in employees: connection terminated',
                details: { operation: 'create', table: 'employees' }
            });
            expect(logger.error).toHaveBeenCalledWith(
                { table: 'employees', operation: 'create', error: 'connection terminated' },
                'Database operation failed'
            );
        });
    });

    describe('queries', () => {
        it('should page through active employees by name', async () => {
            await repository.findAll(10, 20);

            expect(store.find).toHaveBeenCalledWith({
                where: { deleted_at: IsNull() },
                order: { name: 'ASC' },
                take: 10,
                skip: 20
            });
        });

        it('should look up an active employee by email', async () => {
            store.findOne.mockResolvedValue(buildEmployee());

            const employee = await repository.findByEmail('jordan.lee@example.com');

            expect(employee?.id).toBe('emp-1');
            expect(store.findOne).toHaveBeenCalledWith({
                where: { email: 'jordan.lee@example.com', deleted_at: IsNull() }
            });
        });

        it('should list the reports of a manager', async () => {
            await repository.findByManager('emp-9');

            expect(store.find).toHaveBeenCalledWith(expect.objectContaining({
                where: { manager_id: 'emp-9', deleted_at: IsNull() }
            }));
        });

        it('should match any of the given skills', async () => {
            await repository.findBySkills(['SQL', 'Docker']);

            expect(store.find).toHaveBeenCalledWith(expect.objectContaining({
                where: { skills: ArrayOverlap(['SQL', 'Docker']), deleted_at: IsNull() }
            }));
        });

        it('should skip the query for an empty skill list', async () => {
            expect(await repository.findBySkills([])).toEqual([]);
            expect(store.find).not.toHaveBeenCalled();
        });

        it('should expand a level range', async () => {
            await repository.findByLevelRange('junior', 'senior');

            expect(store.find).toHaveBeenCalledWith(expect.objectContaining({
                where: { level: In(['junior', 'mid', 'senior']), deleted_at: IsNull() }
            }));
        });

        it('should reject an inverted level range', async () => {
            await expect(repository.findByLevelRange('senior', 'junior')).rejects.toThrow(
                'Level range is empty: senior is above junior'
            );
        });

        it('should filter team members by level when given', async () => {
            await repository.getTeamMembers('engineering', 'lead');

            expect(store.find).toHaveBeenCalledWith(expect.objectContaining({
                where: { department: 'engineering', level: 'lead', deleted_at: IsNull() }
            }));
        });
    });

    describe('update', () => {
        it('should return null for an unknown employee', async () => {
            expect(await repository.update('emp-missing', { name: 'New' })).toBeNull();
            expect(store.save).not.toHaveBeenCalled();
        });

        it('should merge the changes into the stored row', async () => {
            store.findOne.mockResolvedValue(buildEmployee());

            const updated = await repository.updateSkills('emp-1', ['SQL', 'Python']);

            expect(updated?.skills).toEqual(['SQL', 'Python']);
            expect(updated?.name).toBe('Jordan Lee');
        });
    });

    describe('addPerformanceRating', () => {
        it('should append the rating dated today when no date is given', async () => {
            store.findOne.mockResolvedValue(buildEmployee({
                performance_ratings: [{ date: '2024-01-15', rating: 3 }]
            }));

            const updated = await repository.addPerformanceRating(
                'emp-1',
                { rating: 4, reviewer: 'Sam' },
                new Date('2024-07-01T12:00:00.000Z')
            );

            expect(updated?.performance_ratings).toEqual([
                { date: '2024-01-15', rating: 3 },
                { rating: 4, reviewer: 'Sam', date: '2024-07-01' }
            ]);
        });
    });

    describe('delete and restore', () => {
        it('should soft delete instead of removing the row', async () => {
            store.findOne.mockResolvedValue(buildEmployee());

            expect(await repository.delete('emp-1')).toBe(true);
            expect(store.delete).not.toHaveBeenCalled();
            expect(store.save).toHaveBeenCalledWith(expect.objectContaining({ id: 'emp-1', deleted_at: expect.any(Date) }));
        });

        it('should report a missing employee', async () => {
            expect(await repository.delete('emp-missing')).toBe(false);
        });

        it('should restore a soft-deleted employee', async () => {
            store.findOne.mockResolvedValue(buildEmployee({ deleted_at: new Date('2024-08-01T00:00:00.000Z') }));

            const restored = await repository.restore('emp-1');

            expect(store.findOne).toHaveBeenCalledWith({ where: { id: 'emp-1' } });
            expect(restored?.deleted_at).toBeNull();
        });

        it('should leave an active employee untouched', async () => {
            store.findOne.mockResolvedValue(buildEmployee());

            await repository.restore('emp-1');

            expect(store.save).not.toHaveBeenCalled();
        });
    });
});
