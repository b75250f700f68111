import type { ILogger } from '../config/logger';
import type { AnalysisResult, GeneratedQuestion, RecommendationSet, ResponseMap } from '../types/interview';
import { decisionSupportDefinition } from './decision-support';
import { Agent } from './pipeline';
import { questionGeneratorDefinition } from './question-generator';
import { responseAnalyzerDefinition } from './response-analyzer';
import type {
    AgentCollaborators,
    AgentDefinition,
    AgentName,
    QuestionGenerationContext,
    QuestionGenerationResult,
    RecommendationContext,
    RecommendationResult,
    ResponseAnalysisContext,
    ResponseAnalysisResult,
    StageOutcome
} from './types';

export interface AgentDefinitions {
    questionGenerator: AgentDefinition<QuestionGenerationContext, GeneratedQuestion[], QuestionGenerationResult>;
    responseAnalyzer: AgentDefinition<ResponseAnalysisContext, AnalysisResult, ResponseAnalysisResult>;
    decisionSupport: AgentDefinition<RecommendationContext, RecommendationSet, RecommendationResult>;
}

export const defaultAgentDefinitions: AgentDefinitions = {
    questionGenerator: questionGeneratorDefinition,
    responseAnalyzer: responseAnalyzerDefinition,
    decisionSupport: decisionSupportDefinition
};

export interface Agents {
    questionGenerator: Agent<QuestionGenerationContext, GeneratedQuestion[], QuestionGenerationResult>;
    responseAnalyzer: Agent<ResponseAnalysisContext, AnalysisResult, ResponseAnalysisResult>;
    decisionSupport: Agent<RecommendationContext, RecommendationSet, RecommendationResult>;
}

export function createAgents(
    collaborators: AgentCollaborators,
    overrides: Partial<AgentDefinitions> = {}
): Agents {
    const definitions = { ...defaultAgentDefinitions, ...overrides };
    return {
        questionGenerator: new Agent(definitions.questionGenerator, collaborators),
        responseAnalyzer: new Agent(definitions.responseAnalyzer, collaborators),
        decisionSupport: new Agent(definitions.decisionSupport, collaborators)
    };
}

export interface StageEnvelope<TResult> {
    stage: AgentName;
    employee_id: string;
    interview_id?: string;
    started_at: string;
    completed_at: string;
    result: TResult;
}

export type GenerateQuestionsRequest = {
    employee_id: string;
    interview_type: string;
    interview_id?: string;
};

export type AnalyzeResponsesRequest = {
    interview_id: string;
    employee_id: string;
    questions: GeneratedQuestion[];
    responses: ResponseMap;
};

export type GenerateRecommendationsRequest = {
    employee_id: string;
    analysis: AnalysisResult;
    interview_id?: string;
};

export interface InterviewEvaluation {
    analysis: StageEnvelope<ResponseAnalysisResult>;
    recommendations: StageEnvelope<RecommendationResult>;
}

/**
 * Interview Coordinator
 *
 * Sequences the agents for one interview. Holds no state between calls:
 * every operation threads the ids and a fresh timestamp into the stage
 * context and wraps the result in a stage envelope.
 */
export class InterviewCoordinator {
    private readonly log: ILogger;

    constructor(
        private readonly agents: Agents,
        logger: ILogger,
        private readonly now: () => Date = () => new Date()
    ) {
        this.log = logger.child({ component: 'coordinator' });
    }

    generateQuestions(
        request: GenerateQuestionsRequest
    ): Promise<StageOutcome<StageEnvelope<QuestionGenerationResult>>> {
        return this.runStage(this.agents.questionGenerator, request.employee_id, request.interview_id, timestamp =>
            this.agents.questionGenerator.process({ ...request, timestamp })
        );
    }

    analyzeResponses(
        request: AnalyzeResponsesRequest
    ): Promise<StageOutcome<StageEnvelope<ResponseAnalysisResult>>> {
        return this.runStage(this.agents.responseAnalyzer, request.employee_id, request.interview_id, timestamp =>
            this.agents.responseAnalyzer.process({ ...request, timestamp })
        );
    }

    generateRecommendations(
        request: GenerateRecommendationsRequest
    ): Promise<StageOutcome<StageEnvelope<RecommendationResult>>> {
        return this.runStage(this.agents.decisionSupport, request.employee_id, request.interview_id, timestamp =>
            this.agents.decisionSupport.process({ ...request, timestamp })
        );
    }

    /**
     * Analysis followed by recommendations. A failed analysis stops the
     * flow before the recommendation stage.
     */
    async evaluateInterview(request: AnalyzeResponsesRequest): Promise<StageOutcome<InterviewEvaluation>> {
        this.log.info(
            { interview_id: request.interview_id, employee_id: request.employee_id },
            'Evaluating interview'
        );

        const analysis = await this.analyzeResponses(request);
        if (!analysis.ok) {
            return analysis;
        }

        const recommendations = await this.generateRecommendations({
            employee_id: request.employee_id,
            interview_id: request.interview_id,
            analysis: analysis.value.result.analysis
        });
        if (!recommendations.ok) {
            return recommendations;
        }

        return {
            ok: true,
            value: { analysis: analysis.value, recommendations: recommendations.value }
        };
    }

    private async runStage<TResult>(
        agent: { name: AgentName },
        employeeId: string,
        interviewId: string | undefined,
        execute: (timestamp: string) => Promise<StageOutcome<TResult>>
    ): Promise<StageOutcome<StageEnvelope<TResult>>> {
        const startedAt = this.now().toISOString();
        const outcome = await execute(startedAt);

        if (!outcome.ok) {
            this.log.warn(
                { stage: agent.name, employee_id: employeeId, interview_id: interviewId, error: outcome.error.toJSON() },
                'Stage did not complete'
            );
            return outcome;
        }

        return {
            ok: true,
            value: {
                stage: agent.name,
                employee_id: employeeId,
                ...(interviewId ? { interview_id: interviewId } : {}),
                started_at: startedAt,
                completed_at: this.now().toISOString(),
                result: outcome.value
            }
        };
    }
}
