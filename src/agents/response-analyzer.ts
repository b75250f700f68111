import type { AnalysisResult } from '../types/interview';
import { assemblePrompt, formatBenchmarks, formatQuestionAnswerPairs } from './context-assembler';
import { formatEmployeeProfile } from './profile-formatter';
import { responseAnalysisContextSchema } from './schemas';
import { scoreAnalysisConfidence } from './scoring';
import { placeholderAnalysisStructurer } from './structurers';
import type { AgentDefinition, ResponseAnalysisContext, ResponseAnalysisResult } from './types';

const INSTRUCTIONS = `You analyze employee answers from HR interviews.

Score each answer set from 1 to 10 on technical skills, communication,
problem solving, leadership, teamwork, adaptability, cultural fit and
growth potential.

Back every conclusion with evidence quoted or paraphrased from the answers:
concrete examples, measurable results and behaviour patterns. List strengths
with their evidence and development areas with the gap you observed.
Flag anything that looks like a concern.

Stay objective and avoid bias.`;

export const responseAnalyzerDefinition: AgentDefinition<
    ResponseAnalysisContext,
    AnalysisResult,
    ResponseAnalysisResult
> = {
    name: 'response_analyzer',
    role: 'Analyze interview responses and extract evidence-backed insights',
    instructions: INSTRUCTIONS,
    requiredFields: ['interview_id', 'responses', 'questions', 'employee_id'],
    schema: responseAnalysisContextSchema,
    lookups: { jobRequirements: false },

    buildPrompt(context, { profile, benchmarks }) {
        return assemblePrompt([
            formatEmployeeProfile(profile),
            `INTERVIEW QUESTIONS AND RESPONSES:\n${formatQuestionAnswerPairs(context.questions, context.responses)}`,
            formatBenchmarks(benchmarks),
            'Analyze these responses. Give a score for each evaluation criterion with the reasoning behind it.'
        ]);
    },

    structure: placeholderAnalysisStructurer,
    score: scoreAnalysisConfidence,

    envelope(analysis, score, context) {
        return {
            analysis,
            metadata: {
                interview_id: context.interview_id,
                employee_id: context.employee_id,
                analyzed_responses: Object.keys(context.responses).length,
                analysis_timestamp: context.timestamp ?? null,
                confidence_level: score
            }
        };
    }
};
