import { Router } from "express";
import type { Request, Response } from "express";
import { z } from "zod";
import type { AppContainer } from "../container";
import { asyncHandler } from "../middleware/error-handler";
import { DifficultyLevel, QuestionCategory, QuestionType } from "../types/interview";
import { NotFoundError } from "../utils/errors";

const questionFiltersSchema = z.object({
    question_type: z.nativeEnum(QuestionType).optional(),
    category: z.nativeEnum(QuestionCategory).optional(),
    difficulty: z.nativeEnum(DifficultyLevel).optional(),
    position: z.string().min(1).optional(),
    department: z.string().min(1).optional()
});

const listQuestionsQuerySchema = questionFiltersSchema.extend({
    search: z.string().min(1).optional(),
    random: z.coerce.number().int().min(1).max(100).optional(),
    limit: z.coerce.number().int().min(1).max(100).default(20)
});

const matchingQuerySchema = z.object({
    position: z.string().min(1),
    department: z.string().min(1),
    level: z.string().min(1)
});

const createQuestionSchema = z.object({
    question_text: z.string().min(1),
    question_type: z.nativeEnum(QuestionType),
    category: z.nativeEnum(QuestionCategory),
    difficulty: z.nativeEnum(DifficultyLevel).default(DifficultyLevel.MEDIUM),
    target_positions: z.array(z.string().min(1)).default([]),
    target_departments: z.array(z.string().min(1)).default([]),
    target_levels: z.array(z.string().min(1)).default([])
});

/**
 * Question bank routes. `search` wins over `random`, which wins over the
 * plain filters. `/matching` lists questions targeted at any of a position,
 * department or level.
 */
export function questionRoutes({ repositories }: AppContainer): Router {
    const router = Router();
    const questions = repositories.questions;

    router.get('/', asyncHandler(async (req: Request, res: Response) => {
        const { search, random, limit, ...filters } = listQuestionsQuerySchema.parse(req.query);

        if (search) {
            res.json(await questions.search(search));
        } else if (random) {
            res.json(await questions.randomSample(random, filters));
        } else {
            res.json(await questions.findFiltered(filters, limit));
        }
    }));

    router.get('/matching', asyncHandler(async (req: Request, res: Response) => {
        const { position, department, level } = matchingQuerySchema.parse(req.query);
        res.json(await questions.findForPosition(position, department, level));
    }));

    router.post('/', asyncHandler(async (req: Request, res: Response) => {
        const body = createQuestionSchema.parse(req.body);
        res.status(201).json(await questions.create({ ...body, is_active: true }));
    }));

    router.delete('/:id', asyncHandler(async (req: Request, res: Response) => {
        if (!(await questions.deactivate(req.params.id))) {
            throw new NotFoundError(`Question ${req.params.id} not found`, {
                resourceType: 'Question',
                resourceId: req.params.id
            });
        }
        res.status(204).end();
    }));

    return router;
}
