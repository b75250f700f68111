import { Router } from "express";
import type { Request, Response } from "express";
import { z } from "zod";
import { analysisResultSchema } from "../agents/schemas";
import type { AppContainer } from "../container";
import { asyncHandler } from "../middleware/error-handler";

const recommendationRequestSchema = z.object({
    employee_id: z.string().min(1),
    interview_id: z.string().min(1).optional(),
    analysis: analysisResultSchema
});

/**
 * POST /recommendations
 *
 * Runs the decision-support stage on its own, for an analysis produced
 * elsewhere (or edited by a reviewer).
 */
export function recommendationRoutes({ coordinator }: AppContainer): Router {
    const router = Router();

    router.post('/', asyncHandler(async (req: Request, res: Response) => {
        const request = recommendationRequestSchema.parse(req.body);
        const outcome = await coordinator.generateRecommendations(request);
        if (!outcome.ok) {
            throw outcome.error;
        }
        res.json(outcome.value);
    }));

    return router;
}
