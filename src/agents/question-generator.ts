import type { GeneratedQuestion } from '../types/interview';
import { assemblePrompt, formatBenchmarks, formatJobRequirements } from './context-assembler';
import { formatEmployeeProfile } from './profile-formatter';
import { questionGenerationContextSchema } from './schemas';
import { scoreQuestionQuality } from './scoring';
import { placeholderQuestionStructurer } from './structurers';
import type { AgentDefinition, QuestionGenerationContext, QuestionGenerationResult } from './types';

const INSTRUCTIONS = `You are an HR interview question designer.

Write questions for one employee and one interview type that are:
- relevant to the employee's role, level and department
- suited to the interview type
- free of bias and legally compliant
- varied in format and difficulty

Mix technical, behavioral, situational, career development and performance
questions, and give a short rationale for each one. Weigh the employee's
experience, the department's requirements and their growth potential.

Generate 8 to 12 questions per session.`;

export const questionGeneratorDefinition: AgentDefinition<
    QuestionGenerationContext,
    GeneratedQuestion[],
    QuestionGenerationResult
> = {
    name: 'question_generator',
    role: 'Generate interview questions tailored to an employee and role',
    instructions: INSTRUCTIONS,
    requiredFields: ['employee_id', 'interview_type'],
    schema: questionGenerationContextSchema,
    lookups: { jobRequirements: true },

    buildPrompt(context, { profile, jobRequirements, benchmarks }) {
        return assemblePrompt([
            formatEmployeeProfile(profile),
            `INTERVIEW TYPE: ${context.interview_type}`,
            jobRequirements ? formatJobRequirements(jobRequirements) : null,
            formatBenchmarks(benchmarks),
            'Generate interview questions for this context. Include a mix of question types and a rationale for each question.'
        ]);
    },

    structure: placeholderQuestionStructurer,
    score: scoreQuestionQuality,

    envelope(questions, score, context) {
        return {
            questions,
            metadata: {
                employee_id: context.employee_id,
                interview_type: context.interview_type,
                total_questions: questions.length,
                generated_at: context.timestamp ?? null,
                agent_confidence: score
            }
        };
    }
};
