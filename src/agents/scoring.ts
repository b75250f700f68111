import type {
    CriterionScores,
    GeneratedQuestion,
    RecommendationItem,
    ResponseQuality
} from '../types/interview';

// Question sets are judged against a target of ten questions.
const TARGET_QUESTION_COUNT = 10;
const TARGET_RECOMMENDATION_TYPES = 3;
const DEFAULT_PRIORITY = 5;

export const NEUTRAL_ANALYSIS_CONFIDENCE = 0.5;
export const MIN_CONFIDENCE = 0.3;
export const MAX_CONFIDENCE = 1.0;

const RECOMMENDATION_FIELD_WEIGHTS = {
    action_items: 0.3,
    timeline: 0.2,
    success_metrics: 0.3,
    estimated_cost: 0.1,
    roi_projection: 0.1
} as const;

export function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

function mean(values: readonly number[]): number {
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Population standard deviation. Fewer than two values have no spread.
 */
export function populationStdDev(values: readonly number[]): number {
    if (values.length < 2) {
        return 0;
    }
    const average = mean(values);
    const variance = mean(values.map(value => (value - average) ** 2));
    return Math.sqrt(variance);
}

export function scoreQuestionQuality(
    questions: ReadonlyArray<Pick<GeneratedQuestion, 'question_type' | 'category'>>
): number {
    if (questions.length === 0) {
        return 0;
    }

    const types = new Set(questions.map(question => question.question_type));
    const categories = new Set(questions.map(question => question.category));

    const variety = (types.size + categories.size) / TARGET_QUESTION_COUNT;
    const completeness = questions.length / TARGET_QUESTION_COUNT;

    return Math.min(1, (variety + completeness) / 2);
}

export interface ScorableAnalysis {
    criterion_scores?: Partial<CriterionScores> | null;
    response_quality?: Partial<ResponseQuality> | null;
}

export function scoreAnalysisConfidence(analysis: ScorableAnalysis): number {
    const scores = Object.values(analysis.criterion_scores ?? {}).filter(
        (score): score is number => typeof score === 'number'
    );
    const quality = analysis.response_quality ?? {};

    if (scores.length === 0 || Object.keys(quality).length === 0) {
        return NEUTRAL_ANALYSIS_CONFIDENCE;
    }

    const completeness = quality.completeness ?? 0.5;
    const specificity = quality.specificity ?? 0.5;
    const consistency = Math.max(0.5, 1 - populationStdDev(scores) / 10);

    return clamp((completeness + specificity + consistency) / 3, MIN_CONFIDENCE, MAX_CONFIDENCE);
}

type ScorableRecommendation = Partial<
    Pick<RecommendationItem, 'type' | 'priority' | keyof typeof RECOMMENDATION_FIELD_WEIGHTS>
>;

function isPresent(value: string | readonly string[] | null | undefined): boolean {
    if (value === null || value === undefined) {
        return false;
    }
    return value.length > 0;
}

export function scoreRecommendationCompleteness(item: ScorableRecommendation): number {
    let score = 0;
    if (isPresent(item.action_items)) score += RECOMMENDATION_FIELD_WEIGHTS.action_items;
    if (isPresent(item.timeline)) score += RECOMMENDATION_FIELD_WEIGHTS.timeline;
    if (isPresent(item.success_metrics)) score += RECOMMENDATION_FIELD_WEIGHTS.success_metrics;
    if (isPresent(item.estimated_cost)) score += RECOMMENDATION_FIELD_WEIGHTS.estimated_cost;
    if (isPresent(item.roi_projection)) score += RECOMMENDATION_FIELD_WEIGHTS.roi_projection;
    return score;
}

export function scoreRecommendationQuality(items: readonly ScorableRecommendation[]): number {
    if (items.length === 0) {
        return MIN_CONFIDENCE;
    }

    const types = new Set(items.map(item => item.type));
    const variety = Math.min(1, types.size / TARGET_RECOMMENDATION_TYPES);

    const completeness = mean(items.map(scoreRecommendationCompleteness));

    const priorities = new Set(items.map(item => item.priority ?? DEFAULT_PRIORITY));
    const prioritization = priorities.size > 1 ? 1 : 0.5;

    return clamp((variety + completeness + prioritization) / 3, MIN_CONFIDENCE, MAX_CONFIDENCE);
}

export function countHighPriority(items: ReadonlyArray<Pick<RecommendationItem, 'priority'>>, threshold: number): number {
    return items.filter(item => item.priority <= threshold).length;
}
