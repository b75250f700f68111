import { UnrecoverableError } from 'bullmq';
import type { Job } from 'bullmq';
import type { InterviewCoordinator } from '../agents/coordinator';
import type { ILogger } from '../config/logger';
import type { EvaluationJobData, EvaluationJobResult } from '../queue/queue-config';
import type { EvaluationRepository } from '../repositories/evaluation.repository';
import type { InterviewRepository } from '../repositories/interview.repository';
import { InterviewStatus } from '../types/interview';
import type { CriterionScores } from '../types/interview';
import { NotFoundError, ValidationError, describeErrorChain } from '../utils/errors';

// The parts of a BullMQ job the worker reads
export type EvaluationJob = Pick<Job<EvaluationJobData, EvaluationJobResult>, 'id' | 'data' | 'attemptsMade'>;

/**
 * Missing interviews and invalid interview state do not change between
 * attempts, so BullMQ is told not to retry them. Everything else is rethrown
 * as is and retried with backoff.
 */
export function toJobFailure(error: unknown): unknown {
    if (error instanceof ValidationError || error instanceof NotFoundError) {
        const failure = new UnrecoverableError(error.message);
        failure.cause = error;
        return failure;
    }
    return error;
}

export function overallScore(scores: CriterionScores): number {
    const values = Object.values(scores);
    const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
    return Math.round(mean * 100) / 100;
}

/**
 * Evaluation Worker with Dependency Injection
 *
 * Runs the post-interview evaluation for one interview:
 * 1. Load the interview (must be scheduled, with questions and responses)
 * 2. Coordinator: response analysis → recommendations
 * 3. Store the Evaluation, record the overall score, mark the interview completed
 *
 * Errors are logged and rethrown; see `toJobFailure` for which are retried.
 */
export class EvaluationWorker {
    constructor(
        private interviews: InterviewRepository,
        private evaluations: EvaluationRepository,
        private coordinator: InterviewCoordinator,
        private logger: ILogger
    ) { }

    async processEvaluation(job: EvaluationJob): Promise<EvaluationJobResult> {
        const { interviewId } = job.data;
        const log = this.logger.child({ interviewId, workerJobId: job.id, attempt: job.attemptsMade + 1 });

        log.info({}, 'Starting interview evaluation');

        try {
            const result = await this.evaluate(interviewId);
            log.info({ evaluationId: result.evaluationId, overallScore: result.overallScore }, 'Interview evaluation completed');
            return result;
        } catch (error) {
            const failure = toJobFailure(error);
            log.error({
                errors: describeErrorChain(error),
                retryable: !(failure instanceof UnrecoverableError)
            }, 'Interview evaluation failed');
            throw failure;
        }
    }

    private async evaluate(interviewId: string): Promise<EvaluationJobResult> {
        const interview = await this.interviews.findById(interviewId);
        if (!interview) {
            throw new NotFoundError(`Interview ${interviewId} not found`, {
                resourceType: 'Interview',
                resourceId: interviewId
            });
        }
        if (interview.status !== InterviewStatus.SCHEDULED) {
            throw new ValidationError(`Interview ${interviewId} is ${interview.status}`, {
                fields: ['status'],
                details: { interview_id: interviewId }
            });
        }
        if (interview.questions.length === 0 || Object.keys(interview.responses).length === 0) {
            throw new ValidationError(`Interview ${interviewId} has no questions or no responses to evaluate`, {
                fields: ['questions', 'responses'],
                details: { interview_id: interviewId }
            });
        }

        const outcome = await this.coordinator.evaluateInterview({
            interview_id: interview.id,
            employee_id: interview.employee_id,
            questions: interview.questions,
            responses: interview.responses
        });
        if (!outcome.ok) {
            throw outcome.error;
        }

        const { analysis: analysisStage, recommendations: recommendationStage } = outcome.value;
        const { analysis } = analysisStage.result;
        const { recommendations } = recommendationStage.result;
        const score = overallScore(analysis.criterion_scores);

        const evaluation = await this.evaluations.upsertForInterview({
            interview_id: interview.id,
            employee_id: interview.employee_id,
            scores: analysis.criterion_scores,
            overall_score: score,
            strengths: analysis.detailed_feedback.strengths.map(strength => strength.area),
            areas_for_improvement: analysis.detailed_feedback.development_areas.map(area => area.area),
            recommendations: recommendations.items,
            confidence_level: analysisStage.result.metadata.confidence_level,
            detailed_analysis: { analysis, recommendations }
        });

        await this.interviews.recordScore(interview.id, score);
        await this.interviews.updateStatus(interview.id, InterviewStatus.COMPLETED);

        return {
            success: true,
            interviewId: interview.id,
            evaluationId: evaluation.id,
            overallScore: score
        };
    }
}
