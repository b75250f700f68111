import { z } from 'zod';
import {
    InterviewType,
    QuestionCategory,
    QuestionType,
    RecommendationType
} from '../types/interview';

const score = z.number().min(0).max(10);
const ratio = z.number().min(0).max(1);

export const generatedQuestionSchema = z.object({
    id: z.string().min(1),
    question_text: z.string().min(1),
    question_type: z.nativeEnum(QuestionType),
    category: z.nativeEnum(QuestionCategory),
    rationale: z.string(),
    weight: z.number().positive(),
    expected_elements: z.array(z.string())
});

// Spelled out so a score map missing a criterion is rejected.
export const criterionScoresSchema = z.object({
    technical_skills: score,
    communication: score,
    problem_solving: score,
    leadership: score,
    teamwork: score,
    adaptability: score,
    cultural_fit: score,
    growth_potential: score
});

export const analysisResultSchema = z.object({
    overall_assessment: z.object({
        summary: z.string(),
        key_highlights: z.array(z.string()),
        areas_of_concern: z.array(z.string())
    }),
    criterion_scores: criterionScoresSchema,
    detailed_feedback: z.object({
        strengths: z.array(z.object({
            area: z.string(),
            evidence: z.string(),
            impact: z.string()
        })),
        development_areas: z.array(z.object({
            area: z.string(),
            gap: z.string(),
            recommendation: z.string()
        }))
    }),
    response_quality: z.object({
        completeness: ratio,
        specificity: ratio,
        relevance: ratio
    })
});

export const recommendationItemSchema = z.object({
    type: z.nativeEnum(RecommendationType),
    priority: z.number().int().min(1).max(5),
    title: z.string(),
    description: z.string(),
    action_items: z.array(z.string()),
    timeline: z.string().nullable(),
    success_metrics: z.array(z.string()),
    estimated_cost: z.string().nullable(),
    roi_projection: z.string().nullable()
});

export const recommendationSetSchema = z.object({
    executive_summary: z.object({
        overall_recommendation: z.string(),
        key_priorities: z.array(z.string()),
        expected_outcomes: z.string()
    }),
    items: z.array(recommendationItemSchema),
    long_term_pathway: z.object({
        '6_month_goals': z.array(z.string()),
        '12_month_goals': z.array(z.string()),
        '18_month_goals': z.array(z.string())
    }),
    risk_mitigation: z.object({
        potential_risks: z.array(z.string()),
        mitigation_strategies: z.array(z.string())
    })
});

export const responseMapSchema = z.record(z.string());

const stageContextSchema = z.object({
    employee_id: z.string().min(1),
    interview_id: z.string().min(1).optional(),
    timestamp: z.string().optional()
});

export const questionGenerationContextSchema = stageContextSchema.extend({
    interview_type: z.nativeEnum(InterviewType)
});

export const responseAnalysisContextSchema = stageContextSchema.extend({
    interview_id: z.string().min(1),
    questions: z.array(generatedQuestionSchema),
    responses: responseMapSchema
});

export const recommendationContextSchema = stageContextSchema.extend({
    analysis: analysisResultSchema
});
