import { describe, it, expect, beforeEach } from 'vitest';
import { ArrayContains, ILike } from 'typeorm';
import type { Question } from '../../../src/db/entities/question.entity';
import { QuestionRepository } from '../../../src/repositories/question.repository';
import { createMockLogger, createRepositoryStub } from '../../helpers/fixtures';

function bankQuestion(id: string): Question {
    return {
        id,
        question_text: `Bank question ${id}`,
        question_type: 'behavioral',
        category: 'teamwork',
        difficulty: 'medium',
        target_positions: [],
        target_departments: [],
        target_levels: [],
        is_active: true,
        created_at: new Date('2024-05-01T00:00:00.000Z'),
        updated_at: new Date('2024-05-01T00:00:00.000Z')
    };
}

describe('Question Repository', () => {
    let store: ReturnType<typeof createRepositoryStub>;
    let repository: QuestionRepository;

    beforeEach(() => {
        store = createRepositoryStub();
        repository = new QuestionRepository(store, createMockLogger());
    });

    it('should only list active questions', async () => {
        await repository.findFiltered({ category: 'teamwork' });

        expect(store.find).toHaveBeenCalledWith(expect.objectContaining({
            where: { is_active: true, category: 'teamwork' },
            take: 20
        }));
    });

    it('should filter by type and difficulty together', async () => {
        await repository.findFiltered({ question_type: 'situational', difficulty: 'easy' }, 10);

        expect(store.find).toHaveBeenCalledWith({
            where: { is_active: true, question_type: 'situational', difficulty: 'easy' },
            order: { created_at: 'DESC' },
            take: 10,
            skip: undefined
        });
    });

    it('should match a position, department or level target', async () => {
        await repository.findForPosition('Software Engineer', 'engineering', 'mid');

        expect(store.find).toHaveBeenCalledWith(expect.objectContaining({
            where: [
                { target_positions: ArrayContains(['Software Engineer']), is_active: true },
                { target_departments: ArrayContains(['engineering']), is_active: true },
                { target_levels: ArrayContains(['mid']), is_active: true }
            ]
        }));
    });

    it('should apply only the filters that are set', async () => {
        await repository.findFiltered({ difficulty: 'hard', department: 'sales' }, 5);

        expect(store.find).toHaveBeenCalledWith({
            where: { is_active: true, difficulty: 'hard', target_departments: ArrayContains(['sales']) },
            order: { created_at: 'DESC' },
            take: 5,
            skip: undefined
        });
    });

    it('should escape LIKE wildcards in search terms', async () => {
        await repository.search('100%_done');

        expect(store.find).toHaveBeenCalledWith(expect.objectContaining({
            where: { question_text: ILike('%100\\%\\_done%'), is_active: true }
        }));
    });

    it('should deactivate instead of deleting', async () => {
        store.findOne.mockResolvedValue(bankQuestion('q-1'));

        expect(await repository.deactivate('q-1')).toBe(true);
        expect(store.save).toHaveBeenCalledWith(expect.objectContaining({ id: 'q-1', is_active: false }));
        expect(store.delete).not.toHaveBeenCalled();
    });

    it('should report deactivating an unknown question', async () => {
        expect(await repository.deactivate('q-missing')).toBe(false);
    });

    describe('randomSample', () => {
        it('should draw distinct questions with the given random source', async () => {
            store.find.mockResolvedValue([bankQuestion('a'), bankQuestion('b'), bankQuestion('c'), bankQuestion('d')]);

            // Always pick the last remaining candidate
            const sample = await repository.randomSample(2, {}, () => 0.999);

            expect(sample.map(question => question.id)).toEqual(['d', 'a']);
            expect(store.find).toHaveBeenCalledWith(expect.objectContaining({ take: 100 }));
        });

        it('should return the whole pool when it is smaller than the count', async () => {
            store.find.mockResolvedValue([bankQuestion('a'), bankQuestion('b')]);

            const sample = await repository.randomSample(5, {}, () => 0);

            expect(sample.map(question => question.id)).toEqual(['a', 'b']);
        });
    });
});
