import { describe, it, expect } from 'vitest';
import {
    clamp,
    countHighPriority,
    populationStdDev,
    scoreAnalysisConfidence,
    scoreQuestionQuality,
    scoreRecommendationCompleteness,
    scoreRecommendationQuality
} from '../../../src/agents/scoring';
import { placeholderRecommendationStructurer } from '../../../src/agents/structurers';
import type { QuestionCategory, QuestionType } from '../../../src/types/interview';
import { buildAnalysis, buildProfile, sampleBenchmarks } from '../../helpers/fixtures';

function questions(count: number, types: QuestionType[], categories: QuestionCategory[]) {
    return Array.from({ length: count }, (_, i) => ({
        question_type: types[i % types.length],
        category: categories[i % categories.length]
    }));
}

describe('Scoring', () => {
    describe('helpers', () => {
        it('should clamp into range', () => {
            expect(clamp(1.4, 0.3, 1)).toBe(1);
            expect(clamp(0.1, 0.3, 1)).toBe(0.3);
            expect(clamp(0.7, 0.3, 1)).toBe(0.7);
        });

        it('should compute the population standard deviation', () => {
            expect(populationStdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
            expect(populationStdDev([5])).toBe(0);
            expect(populationStdDev([])).toBe(0);
        });
    });

    describe('scoreQuestionQuality', () => {
        it('should score eight same-type questions at 0.5', () => {
            expect(scoreQuestionQuality(questions(8, ['behavioral'], ['skills_assessment']))).toBeCloseTo(0.5, 10);
        });

        it('should reach 1 for ten questions over five types and five categories', () => {
            const set = questions(
                10,
                ['behavioral', 'technical', 'situational', 'career_development', 'performance'],
                ['leadership', 'communication', 'problem_solving', 'teamwork', 'career_goals']
            );
            expect(scoreQuestionQuality(set)).toBe(1);
        });

        it('should cap the score at 1', () => {
            const set = questions(
                14,
                ['behavioral', 'technical', 'situational', 'career_development', 'performance'],
                ['leadership', 'communication', 'problem_solving', 'teamwork', 'career_goals', 'cultural_fit']
            );
            expect(scoreQuestionQuality(set)).toBe(1);
        });

        it('should score an empty set at 0', () => {
            expect(scoreQuestionQuality([])).toBe(0);
        });
    });

    describe('scoreAnalysisConfidence', () => {
        it('should combine completeness, specificity and score consistency', () => {
            // mean 8.375, sd ≈ 0.4841 → consistency ≈ 0.9516
            expect(scoreAnalysisConfidence(buildAnalysis())).toBeCloseTo(0.900529, 5);
        });

        it('should return the neutral value when scores or quality are missing', () => {
            expect(scoreAnalysisConfidence({ criterion_scores: {}, response_quality: { completeness: 1 } })).toBe(0.5);
            expect(scoreAnalysisConfidence({ criterion_scores: { teamwork: 8 }, response_quality: {} })).toBe(0.5);
            expect(scoreAnalysisConfidence({})).toBe(0.5);
        });

        it('should default missing quality keys to 0.5', () => {
            const confidence = scoreAnalysisConfidence({
                criterion_scores: { teamwork: 5, leadership: 5 },
                response_quality: { relevance: 1 }
            });
            expect(confidence).toBeCloseTo(2 / 3, 10);
        });

        it('should stay below 1 when the criterion scores differ', () => {
            const confidence = scoreAnalysisConfidence({
                criterion_scores: {
                    technical_skills: 3,
                    communication: 4,
                    problem_solving: 5,
                    leadership: 6,
                    teamwork: 7,
                    adaptability: 8,
                    cultural_fit: 9,
                    growth_potential: 10
                },
                response_quality: { completeness: 0.9, specificity: 0.85, relevance: 0.95 }
            });
            // sd = √5.25 ≈ 2.2913 → consistency ≈ 0.7709
            expect(confidence).toBeCloseTo(0.8403, 4);
            expect(confidence).toBeLessThan(1);
            expect(confidence).toBeGreaterThanOrEqual(0.3);
        });

        it('should not drop below 0.3', () => {
            const confidence = scoreAnalysisConfidence({
                criterion_scores: { teamwork: 0, leadership: 10 },
                response_quality: { completeness: 0, specificity: 0 }
            });
            expect(confidence).toBe(0.3);
        });
    });

    describe('scoreRecommendationCompleteness', () => {
        it('should weigh each filled field', () => {
            expect(scoreRecommendationCompleteness({
                action_items: ['Do a thing'],
                timeline: '3 months',
                success_metrics: ['Done'],
                estimated_cost: '$100',
                roi_projection: 'High'
            })).toBeCloseTo(1, 10);
            expect(scoreRecommendationCompleteness({
                action_items: ['Do a thing'],
                timeline: null,
                success_metrics: [],
                estimated_cost: '',
                roi_projection: 'High'
            })).toBeCloseTo(0.4, 10);
        });
    });

    describe('scoreRecommendationQuality', () => {
        it('should score the fixed recommendation set at 1', () => {
            const set = placeholderRecommendationStructurer(
                '',
                { employee_id: 'emp-1', analysis: buildAnalysis() },
                { profile: buildProfile(), jobRequirements: null, benchmarks: sampleBenchmarks }
            );
            expect(scoreRecommendationQuality(set.items)).toBeCloseTo(1, 10);
        });

        it('should return 0.3 with no items', () => {
            expect(scoreRecommendationQuality([])).toBe(0.3);
        });

        it('should score a single complete item by its completeness alone', () => {
            const score = scoreRecommendationQuality([{
                type: 'training',
                priority: 1,
                action_items: ['Enrol in the system design course'],
                timeline: '3 months',
                success_metrics: ['Leads one design review'],
                estimated_cost: '$500',
                roi_projection: 'Fewer design reworks'
            }]);
            // variety 1/3, completeness 1, one distinct priority → 0.5
            expect(score).toBeCloseTo((1 / 3 + 1 + 0.5) / 3, 10);
            expect(score).toBeCloseTo(0.6111, 4);
        });

        it('should give the same score for the same items every time', () => {
            const set = placeholderRecommendationStructurer(
                '',
                { employee_id: 'emp-1', analysis: buildAnalysis() },
                { profile: buildProfile(), jobRequirements: null, benchmarks: sampleBenchmarks }
            );
            const before = structuredClone(set.items);

            const first = scoreRecommendationQuality(set.items);
            const second = scoreRecommendationQuality(set.items);

            expect(second).toBe(first);
            expect(set.items).toEqual(before);
        });

        it('should treat a missing priority as 5', () => {
            const score = scoreRecommendationQuality([
                { type: 'training', action_items: ['Course'] },
                { type: 'training', priority: 5, action_items: ['Course'] }
            ]);
            // variety 1/3, completeness 0.3, one distinct priority → 0.5
            expect(score).toBeCloseTo((1 / 3 + 0.3 + 0.5) / 3, 10);
        });
    });

    describe('countHighPriority', () => {
        it('should count items whose priority is within the threshold', () => {
            expect(countHighPriority([{ priority: 1 }, { priority: 2 }, { priority: 3 }], 2)).toBe(2);
        });
    });
});
