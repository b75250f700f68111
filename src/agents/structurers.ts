import type { AnalysisResult, GeneratedQuestion, RecommendationSet } from '../types/interview';
import { QuestionCategory, QuestionType } from '../types/interview';
import analysisFixture from './placeholders/analysis.json';
import recommendationsFixture from './placeholders/recommendations.json';
import { analysisResultSchema, recommendationSetSchema } from './schemas';
import type {
    QuestionGenerationContext,
    RecommendationContext,
    ResponseAnalysisContext,
    Structurer
} from './types';

/*
 * Deterministic placeholder structurers.
 *
 * None of them reads the generated text yet: each returns a fixed payload in
 * the stage's schema. A parsing structurer replaces one of these through
 * `withStructurer` without touching the pipeline.
 */

export const PLACEHOLDER_QUESTION_COUNT = 8;

const PLACEHOLDER_ANALYSIS: AnalysisResult = analysisResultSchema.parse(analysisFixture);
const PLACEHOLDER_RECOMMENDATIONS: RecommendationSet = recommendationSetSchema.parse(recommendationsFixture);

export const placeholderQuestionStructurer: Structurer<QuestionGenerationContext, GeneratedQuestion[]> = () =>
    Array.from({ length: PLACEHOLDER_QUESTION_COUNT }, (_, offset) => {
        const n = offset + 1;
        return {
            id: `q_${n}`,
            question_text: `Sample question ${n}`,
            question_type: QuestionType.BEHAVIORAL,
            category: QuestionCategory.SKILLS_ASSESSMENT,
            rationale: 'Assesses core competencies for the role',
            weight: 1,
            expected_elements: ['specific examples', 'quantifiable results']
        };
    });

export const placeholderAnalysisStructurer: Structurer<ResponseAnalysisContext, AnalysisResult> = () =>
    structuredClone(PLACEHOLDER_ANALYSIS);

export const placeholderRecommendationStructurer: Structurer<RecommendationContext, RecommendationSet> = () =>
    structuredClone(PLACEHOLDER_RECOMMENDATIONS);
