import { Queue, Worker, QueueEvents } from 'bullmq';
import type { Job } from 'bullmq';
import { Redis } from 'ioredis';
import type { AppConfig } from '../config/env';
import type { ILogger } from '../config/logger';

export const EVALUATION_QUEUE = 'interview-evaluation';

export interface EvaluationJobData {
    interviewId: string;
}

export interface EvaluationJobResult {
    success: boolean;
    interviewId: string;
    evaluationId: string;
    overallScore: number;
}

export type EvaluationProcessor = (job: Job<EvaluationJobData, EvaluationJobResult>) => Promise<EvaluationJobResult>;

export interface IEvaluationQueue {
    enqueueEvaluation(interviewId: string): Promise<string | undefined>;
}

/**
 * Queue Configuration
 *
 * BullMQ setup for the post-interview evaluation. The API enqueues one job
 * per submitted interview; the worker runs analysis and recommendations.
 */
export class QueueConfig implements IEvaluationQueue {
    private redis: Redis;
    private evaluationQueue: Queue<EvaluationJobData, EvaluationJobResult>;
    private evaluationWorker: Worker<EvaluationJobData, EvaluationJobResult> | null = null;
    private queueEvents: QueueEvents;

    constructor(
        redisUrl: string,
        private settings: AppConfig['evaluationQueue'],
        private logger: ILogger
    ) {
        this.redis = new Redis(redisUrl, {
            enableReadyCheck: false,
            maxRetriesPerRequest: null,
        });

        this.evaluationQueue = new Queue<EvaluationJobData, EvaluationJobResult>(EVALUATION_QUEUE, {
            connection: this.redis,
            defaultJobOptions: {
                removeOnComplete: 10,
                removeOnFail: 5,
                attempts: settings.maxAttempts,
                backoff: {
                    type: 'exponential',
                    delay: settings.backoffMs,
                },
            },
        });

        this.queueEvents = new QueueEvents(EVALUATION_QUEUE, {
            connection: this.redis,
        });

        this.setupEventListeners();
    }

    async enqueueEvaluation(interviewId: string): Promise<string | undefined> {
        // One job per interview: resubmitting while a job is queued reuses it
        const job = await this.evaluationQueue.add('evaluate-interview', { interviewId }, { jobId: interviewId });
        this.logger.info({ jobId: job.id, interviewId }, 'Evaluation queued');
        return job.id;
    }

    /**
     * Start the evaluation worker
     */
    startWorker(processor: EvaluationProcessor): Worker<EvaluationJobData, EvaluationJobResult> {
        const worker = new Worker<EvaluationJobData, EvaluationJobResult>(EVALUATION_QUEUE, processor, {
            connection: this.redis,
            concurrency: this.settings.concurrency,
        });

        worker.on('completed', (job) => {
            this.logger.info({
                jobId: job.id,
                interviewId: job.data.interviewId,
                duration: job.processedOn === undefined ? undefined : Date.now() - job.processedOn
            }, 'Evaluation job completed');
        });

        worker.on('failed', (job, err) => {
            this.logger.error({
                jobId: job?.id,
                interviewId: job?.data.interviewId,
                error: err.message,
                attempts: job?.attemptsMade
            }, 'Evaluation job failed');
        });

        worker.on('stalled', (jobId) => {
            this.logger.warn({ jobId }, 'Evaluation job stalled');
        });

        this.evaluationWorker = worker;
        return worker;
    }

    private setupEventListeners() {
        this.queueEvents.on('waiting', ({ jobId }) => {
            this.logger.debug({ jobId }, 'Job waiting in queue');
        });

        this.queueEvents.on('active', ({ jobId }) => {
            this.logger.debug({ jobId }, 'Job started processing');
        });

        this.queueEvents.on('failed', ({ jobId, failedReason }) => {
            this.logger.warn({ jobId, failedReason }, 'Job attempt failed');
        });
    }

    /**
     * Close all connections
     */
    async close() {
        await this.evaluationWorker?.close();
        await this.evaluationQueue.close();
        await this.queueEvents.close();
        await this.redis.quit();
    }
}
