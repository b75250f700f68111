import { HIGH_PRIORITY_THRESHOLD } from '../types/interview';
import type { RecommendationSet } from '../types/interview';
import {
    assemblePrompt,
    formatBenchmarks,
    formatCriterionScores,
    formatDevelopmentAreas,
    formatJobRequirements,
    formatStrengths
} from './context-assembler';
import { NOT_AVAILABLE, formatEmployeeProfile } from './profile-formatter';
import { recommendationContextSchema } from './schemas';
import { countHighPriority, scoreRecommendationQuality } from './scoring';
import { placeholderRecommendationStructurer } from './structurers';
import type { AgentDefinition, RecommendationContext, RecommendationResult } from './types';

const INSTRUCTIONS = `You support HR decisions about an employee's development.

Recommend actions covering promotion or role change, training, performance
improvement, recognition and mentoring where the evidence supports them.
Every recommendation needs concrete action items, a timeline, success
metrics, an estimated cost and an expected return.

Ground recommendations in the interview analysis and the employee's goals,
keep them realistic for the organisation, and order them by impact and
feasibility (priority 1 is the most urgent).`;

export const decisionSupportDefinition: AgentDefinition<
    RecommendationContext,
    RecommendationSet,
    RecommendationResult
> = {
    name: 'decision_support',
    role: 'Turn interview analysis into prioritized HR recommendations',
    instructions: INSTRUCTIONS,
    requiredFields: ['employee_id', 'analysis'],
    schema: recommendationContextSchema,
    lookups: { jobRequirements: true },

    buildPrompt({ analysis }, { profile, jobRequirements, benchmarks }) {
        return assemblePrompt([
            formatEmployeeProfile(profile),
            [
                'INTERVIEW ANALYSIS RESULTS:',
                `Overall Assessment: ${analysis.overall_assessment.summary || NOT_AVAILABLE}`
            ].join('\n'),
            `Criterion Scores:\n${formatCriterionScores(analysis.criterion_scores)}`,
            `Strengths:\n${formatStrengths(analysis.detailed_feedback.strengths)}`,
            `Development Areas:\n${formatDevelopmentAreas(analysis.detailed_feedback.development_areas)}`,
            formatBenchmarks(benchmarks),
            jobRequirements ? formatJobRequirements(jobRequirements) : null,
            'Provide prioritized recommendations for this employee\'s development and career progression, with action items, timelines and success metrics.'
        ]);
    },

    structure: placeholderRecommendationStructurer,
    score: recommendations => scoreRecommendationQuality(recommendations.items),

    envelope(recommendations, score, context) {
        return {
            recommendations,
            metadata: {
                employee_id: context.employee_id,
                total_recommendations: recommendations.items.length,
                high_priority_count: countHighPriority(recommendations.items, HIGH_PRIORITY_THRESHOLD),
                generated_at: context.timestamp ?? null,
                confidence_level: score
            }
        };
    }
};
