import type { z } from 'zod';
import type {
    CriterionScores,
    DepartmentBenchmarks,
    DevelopmentArea,
    GeneratedQuestion,
    JobRequirements,
    ResponseMap,
    Strength
} from '../types/interview';
import { ValidationError } from '../utils/errors';
import { NOT_AVAILABLE, joinOrNotAvailable } from './profile-formatter';
import type { StageContext, StageOutcome } from './types';

export const NO_RESPONSE = 'No response';

/**
 * Validate a raw stage input against the agent's required fields and schema.
 *
 * Presence is checked first so a missing field is always reported by name,
 * even when other fields are also malformed.
 */
export function validateStageContext<TContext extends StageContext>(
    stage: string,
    requiredFields: readonly string[],
    schema: z.ZodType<TContext, z.ZodTypeDef, unknown>,
    input: Record<string, unknown>
): StageOutcome<TContext> {
    const missing = requiredFields.filter(field => input[field] === undefined || input[field] === null);

    if (missing.length > 0) {
        return {
            ok: false,
            error: new ValidationError(`Missing required fields for ${stage}: ${missing.join(', ')}`, {
                fields: missing,
                details: { stage }
            })
        };
    }

    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => ({
            path: issue.path.join('.'),
            message: issue.message
        }));
        return {
            ok: false,
            error: new ValidationError(`Invalid context for ${stage}`, {
                fields: Array.from(new Set(issues.map(issue => issue.path.split('.')[0]))),
                issues,
                details: { stage }
            })
        };
    }

    return { ok: true, value: parsed.data };
}

export function formatScore(value: number | null | undefined): string {
    if (value === null || value === undefined || Number.isNaN(value)) {
        return NOT_AVAILABLE;
    }
    return String(Number(value.toFixed(2)));
}

/**
 * Look up the answer to question `index` (1-based): by index first, then by
 * the question text, else the no-response marker.
 */
export function findResponse(responses: ResponseMap, index: number, questionText: string): string {
    const byIndex = String(index);
    if (Object.hasOwn(responses, byIndex)) {
        return responses[byIndex];
    }
    if (Object.hasOwn(responses, questionText)) {
        return responses[questionText];
    }
    return NO_RESPONSE;
}

export function formatQuestionAnswerPairs(questions: readonly GeneratedQuestion[], responses: ResponseMap): string {
    return questions
        .map((question, offset) => {
            const index = offset + 1;
            const text = question.question_text || `Question ${index}`;
            return [
                `Q${index}: ${text}`,
                `Response: ${findResponse(responses, index, text)}`,
                `Question Type: ${question.question_type || 'Unknown'}`,
                '---'
            ].join('\n');
        })
        .join('\n');
}

export function formatCriterionScores(scores: Partial<CriterionScores>): string {
    const lines = Object.entries(scores).map(([criterion, score]) => `- ${criterion}: ${formatScore(score)}/10`);
    return lines.length > 0 ? lines.join('\n') : NOT_AVAILABLE;
}

export function formatStrengths(strengths: readonly Strength[]): string {
    if (strengths.length === 0) {
        return NOT_AVAILABLE;
    }
    return strengths
        .map(strength => `- ${strength.area || NOT_AVAILABLE}: ${strength.evidence || NOT_AVAILABLE}`)
        .join('\n');
}

export function formatDevelopmentAreas(areas: readonly DevelopmentArea[]): string {
    if (areas.length === 0) {
        return NOT_AVAILABLE;
    }
    return areas
        .map(area => `- ${area.area || NOT_AVAILABLE}: ${area.gap || NOT_AVAILABLE}`)
        .join('\n');
}

export function formatJobRequirements(requirements: JobRequirements): string {
    return [
        'JOB REQUIREMENTS:',
        `Required Skills: ${joinOrNotAvailable(requirements.required_skills)}`,
        `Preferred Skills: ${joinOrNotAvailable(requirements.preferred_skills)}`,
        `Experience Level: ${requirements.experience_level || NOT_AVAILABLE}`,
        `Key Competencies: ${joinOrNotAvailable(requirements.competencies)}`
    ].join('\n');
}

export function formatBenchmarks(benchmarks: DepartmentBenchmarks): string {
    return [
        'DEPARTMENT BENCHMARKS:',
        `Average Score: ${formatScore(benchmarks.average_score)}`,
        `Top Quartile: ${formatScore(benchmarks.top_quartile)}`
    ].join('\n');
}

/**
 * Join prompt sections with a blank line, skipping empty ones.
 */
export function assemblePrompt(sections: ReadonlyArray<string | null | undefined>): string {
    return sections
        .filter((section): section is string => typeof section === 'string' && section.trim().length > 0)
        .join('\n\n');
}
