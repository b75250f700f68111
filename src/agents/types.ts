import type { z } from 'zod';
import type { ILogger } from '../config/logger';
import type {
    AnalysisResult,
    DepartmentBenchmarks,
    EmployeeProfile,
    GeneratedQuestion,
    InterviewType,
    JobRequirements,
    RecommendationSet,
    ResponseMap
} from '../types/interview';
import type { NotFoundError, ValidationError } from '../utils/errors';

// Collaborator contracts the agents call through

export interface IEmployeeDirectory {
    getEmployeeProfile(employeeId: string): Promise<EmployeeProfile | null>;
    getJobRequirements(position: string, department: string): Promise<JobRequirements>;
}

export interface IBenchmarkProvider {
    getDepartmentBenchmarks(department: string): Promise<DepartmentBenchmarks>;
}

export interface ITextGenerator {
    generate(systemInstructions: string, prompt: string): Promise<string>;
}

export interface AgentCollaborators {
    directory: IEmployeeDirectory;
    benchmarks: IBenchmarkProvider;
    generator: ITextGenerator;
    logger: ILogger;
}

export type AgentName = 'question_generator' | 'response_analyzer' | 'decision_support';

/**
 * Expected failures (bad input, unknown employee) come back as values;
 * collaborator failures are thrown.
 */
export type StageOutcome<T> =
    | { ok: true; value: T }
    | { ok: false; error: ValidationError | NotFoundError };

// Stage contexts

export interface StageContext {
    employee_id: string;
    interview_id?: string;
    timestamp?: string;
}

export interface QuestionGenerationContext extends StageContext {
    interview_type: InterviewType;
}

export interface ResponseAnalysisContext extends StageContext {
    interview_id: string;
    questions: GeneratedQuestion[];
    responses: ResponseMap;
}

export interface RecommendationContext extends StageContext {
    analysis: AnalysisResult;
}

// Stage results

export interface QuestionGenerationResult {
    questions: GeneratedQuestion[];
    metadata: {
        employee_id: string;
        interview_type: InterviewType;
        total_questions: number;
        generated_at: string | null;
        agent_confidence: number;
    };
}

export interface ResponseAnalysisResult {
    analysis: AnalysisResult;
    metadata: {
        interview_id: string;
        employee_id: string;
        analyzed_responses: number;
        analysis_timestamp: string | null;
        confidence_level: number;
    };
}

export interface RecommendationResult {
    recommendations: RecommendationSet;
    metadata: {
        employee_id: string;
        total_recommendations: number;
        high_priority_count: number;
        generated_at: string | null;
        confidence_level: number;
    };
}

/**
 * Everything looked up for a stage before the generation call.
 */
export interface GatheredContext {
    profile: EmployeeProfile;
    jobRequirements: JobRequirements | null;
    benchmarks: DepartmentBenchmarks;
}

/**
 * Maps raw generated text into a stage's fixed schema. Must not throw.
 */
export type Structurer<TContext, TPayload> = (
    rawText: string,
    context: TContext,
    gathered: GatheredContext
) => TPayload;

export type Scorer<TPayload> = (payload: TPayload) => number;

/**
 * Everything that distinguishes one agent from another. The pipeline in
 * pipeline.ts is the only code that runs a definition.
 */
export interface AgentDefinition<TContext extends StageContext, TPayload, TResult> {
    name: AgentName;
    role: string;
    instructions: string;
    requiredFields: readonly (keyof TContext & string)[];
    schema: z.ZodType<TContext, z.ZodTypeDef, unknown>;
    lookups: {
        jobRequirements: boolean;
    };
    buildPrompt(context: TContext, gathered: GatheredContext): string;
    structure: Structurer<TContext, TPayload>;
    score: Scorer<TPayload>;
    envelope(payload: TPayload, score: number, context: TContext): TResult;
}
