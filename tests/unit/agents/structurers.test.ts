import { describe, it, expect } from 'vitest';
import {
    PLACEHOLDER_QUESTION_COUNT,
    placeholderAnalysisStructurer,
    placeholderQuestionStructurer,
    placeholderRecommendationStructurer
} from '../../../src/agents/structurers';
import type { GatheredContext } from '../../../src/agents/types';
import { buildAnalysis, buildProfile, sampleBenchmarks } from '../../helpers/fixtures';

const gathered: GatheredContext = { profile: buildProfile(), jobRequirements: null, benchmarks: sampleBenchmarks };

describe('Placeholder Structurers', () => {
    it('should produce eight numbered behavioral questions', () => {
        const questions = placeholderQuestionStructurer(
            'ignored',
            { employee_id: 'emp-1', interview_type: 'skills_assessment' },
            gathered
        );

        expect(questions).toHaveLength(PLACEHOLDER_QUESTION_COUNT);
        expect(questions.map(question => question.id)).toEqual(['q_1', 'q_2', 'q_3', 'q_4', 'q_5', 'q_6', 'q_7', 'q_8']);
        expect(questions[7]).toEqual({
            id: 'q_8',
            question_text: 'Sample question 8',
            question_type: 'behavioral',
            category: 'skills_assessment',
            rationale: 'Assesses core competencies for the role',
            weight: 1,
            expected_elements: ['specific examples', 'quantifiable results']
        });
    });

    it('should return the same analysis whatever the generated text', () => {
        const context = { employee_id: 'emp-1', interview_id: 'int-1', questions: [], responses: {} };
        const first = placeholderAnalysisStructurer('one', context, gathered);
        const second = placeholderAnalysisStructurer('two', context, gathered);

        expect(first).toEqual(second);
        expect(first.criterion_scores.communication).toBe(9);
        expect(first.detailed_feedback.strengths.map(strength => strength.area)).toEqual([
            'Technical Problem Solving',
            'Communication'
        ]);
    });

    it('should hand out independent copies', () => {
        const context = { employee_id: 'emp-1', analysis: buildAnalysis() };
        const first = placeholderRecommendationStructurer('', context, gathered);
        first.items[0].title = 'Changed';

        const second = placeholderRecommendationStructurer('', context, gathered);
        expect(second.items.map(item => item.title)).toEqual([
            'Leadership Development Program',
            'Senior Technical Mentorship',
            'Performance Recognition'
        ]);
        expect(second.items.map(item => item.priority)).toEqual([1, 2, 3]);
    });
});
