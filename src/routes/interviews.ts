import { Router } from "express";
import type { Request, Response } from "express";
import { z } from "zod";
import { responseMapSchema } from "../agents/schemas";
import type { AppContainer } from "../container";
import type { Interview } from "../db/entities/interview.entity";
import { asyncHandler } from "../middleware/error-handler";
import { DifficultyLevel, InterviewStatus, InterviewType } from "../types/interview";
import { NotFoundError, ValidationError } from "../utils/errors";

const createInterviewSchema = z.object({
    employee_id: z.string().uuid(),
    interview_type: z.nativeEnum(InterviewType),
    scheduled_date: z.coerce.date(),
    duration_minutes: z.number().int().positive().nullable().optional(),
    notes: z.string().nullable().optional()
});

const listInterviewsQuerySchema = z.object({
    employee_id: z.string().uuid().optional(),
    status: z.nativeEnum(InterviewStatus).optional(),
    interview_type: z.nativeEnum(InterviewType).optional(),
    department: z.string().min(1).optional(),
    from: z.coerce.date().optional(),
    to: z.coerce.date().optional(),
    limit: z.coerce.number().int().min(1).max(500).default(100),
    offset: z.coerce.number().int().min(0).default(0)
});

const DAY_MS = 24 * 60 * 60 * 1000;

const recentQuerySchema = z.object({
    days: z.coerce.number().int().min(1).max(365).default(7)
});

const completedQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(500).default(50)
});

const calendarQuerySchema = z.object({
    from: z.coerce.date(),
    to: z.coerce.date()
}).refine(range => range.from <= range.to, { message: '`from` must not be after `to`', path: ['from'] });

const generateQuestionsSchema = z.object({
    save_to_bank: z.boolean().default(false),
    difficulty: z.nativeEnum(DifficultyLevel).optional()
});

const submitResponsesSchema = z.object({
    responses: responseMapSchema.refine(responses => Object.keys(responses).length > 0, {
        message: 'At least one response is required'
    })
});

/**
 * Interview routes
 *
 * POST /interviews                  schedule an interview
 * GET  /interviews                  list (employee_id, status, interview_type, department, from, to)
 * GET  /interviews/pending          scheduled interviews
 * GET  /interviews/completed        latest completed (limit)
 * GET  /interviews/recent           created in the last `days`
 * GET  /interviews/calendar         scheduled between `from` and `to`
 * GET  /interviews/:id
 * POST /interviews/:id/questions    generate questions for a scheduled interview
 * POST /interviews/:id/responses    store answers and queue the evaluation
 * GET  /interviews/:id/evaluation
 * POST /interviews/:id/cancel
 */
export function interviewRoutes({
    repositories,
    directory,
    coordinator,
    evaluationQueue,
    logger
}: AppContainer): Router {
    const router = Router();
    const { interviews, employees, evaluations } = repositories;

    async function requireInterview(id: string): Promise<Interview> {
        const interview = await interviews.findById(id);
        if (!interview) {
            throw new NotFoundError(`Interview ${id} not found`, { resourceType: 'Interview', resourceId: id });
        }
        return interview;
    }

    function requireScheduled(interview: Interview): void {
        if (interview.status !== InterviewStatus.SCHEDULED) {
            throw new ValidationError(`Interview ${interview.id} is ${interview.status}`, {
                fields: ['status'],
                details: { interview_id: interview.id }
            });
        }
    }

    router.post('/', asyncHandler(async (req: Request, res: Response) => {
        const body = createInterviewSchema.parse(req.body);

        if (!(await employees.exists(body.employee_id))) {
            throw new NotFoundError(`Employee ${body.employee_id} not found`, {
                resourceType: 'Employee',
                resourceId: body.employee_id
            });
        }

        const interview = await interviews.create({ ...body, status: InterviewStatus.SCHEDULED });
        logger.info({ interviewId: interview.id, employeeId: body.employee_id }, 'Interview scheduled');
        res.status(201).json(interview);
    }));

    router.get('/', asyncHandler(async (req: Request, res: Response) => {
        const { limit, offset, ...filters } = listInterviewsQuerySchema.parse(req.query);
        res.json(await interviews.findFiltered(filters, limit, offset));
    }));

    router.get('/pending', asyncHandler(async (req: Request, res: Response) => {
        res.json(await interviews.findPending());
    }));

    router.get('/completed', asyncHandler(async (req: Request, res: Response) => {
        const { limit } = completedQuerySchema.parse(req.query);
        res.json(await interviews.findCompleted(limit));
    }));

    router.get('/recent', asyncHandler(async (req: Request, res: Response) => {
        const { days } = recentQuerySchema.parse(req.query);
        res.json(await interviews.findRecent(new Date(Date.now() - days * DAY_MS)));
    }));

    router.get('/calendar', asyncHandler(async (req: Request, res: Response) => {
        const { from, to } = calendarQuerySchema.parse(req.query);
        res.json(await interviews.findByDateRange(from, to));
    }));

    router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
        res.json(await requireInterview(req.params.id));
    }));

    router.post('/:id/questions', asyncHandler(async (req: Request, res: Response) => {
        const options = generateQuestionsSchema.parse(req.body ?? {});
        const interview = await requireInterview(req.params.id);
        requireScheduled(interview);

        const outcome = await coordinator.generateQuestions({
            employee_id: interview.employee_id,
            interview_id: interview.id,
            interview_type: interview.interview_type
        });
        if (!outcome.ok) {
            throw outcome.error;
        }

        const { questions } = outcome.value.result;
        await interviews.recordQuestions(interview.id, questions);

        if (options.save_to_bank) {
            const profile = await directory.getEmployeeProfile(interview.employee_id);
            await directory.saveQuestionBank(questions, {
                position: profile?.position,
                department: profile?.department,
                level: profile?.level,
                difficulty: options.difficulty
            });
        }

        logger.info({ interviewId: interview.id, questionCount: questions.length }, 'Interview questions generated');
        res.json(outcome.value);
    }));

    router.post('/:id/responses', asyncHandler(async (req: Request, res: Response) => {
        const { responses } = submitResponsesSchema.parse(req.body);
        const interview = await requireInterview(req.params.id);

        if (interview.questions.length === 0) {
            throw new ValidationError(`Interview ${interview.id} has no questions yet`, {
                fields: ['questions'],
                details: { interview_id: interview.id }
            });
        }

        await interviews.recordResponses(interview.id, responses);
        const jobId = await evaluationQueue.enqueueEvaluation(interview.id);

        res.status(202).json({
            interview_id: interview.id,
            job_id: jobId ?? null,
            status: 'queued'
        });
    }));

    router.get('/:id/evaluation', asyncHandler(async (req: Request, res: Response) => {
        const evaluation = await evaluations.findByInterview(req.params.id);
        if (!evaluation) {
            throw new NotFoundError(`No evaluation for interview ${req.params.id}`, {
                resourceType: 'Evaluation',
                resourceId: req.params.id
            });
        }
        res.json(evaluation);
    }));

    router.post('/:id/cancel', asyncHandler(async (req: Request, res: Response) => {
        await requireInterview(req.params.id);
        const interview = await interviews.updateStatus(req.params.id, InterviewStatus.CANCELLED);
        logger.info({ interviewId: req.params.id }, 'Interview cancelled');
        res.json(interview);
    }));

    return router;
}
