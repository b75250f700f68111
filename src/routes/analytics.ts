import { Router } from "express";
import type { Request, Response } from "express";
import { z } from "zod";
import type { AppContainer } from "../container";
import { asyncHandler } from "../middleware/error-handler";

const trendsQuerySchema = z.object({
    days: z.coerce.number().int().min(1).max(3650).default(90)
});

export function analyticsRoutes({ analytics }: AppContainer): Router {
    const router = Router();

    router.get('/departments/:department/benchmarks', asyncHandler(async (req: Request, res: Response) => {
        const benchmarks = await analytics.getDepartmentBenchmarks(req.params.department);
        res.json({ department: req.params.department, ...benchmarks });
    }));

    router.get('/skills/:skill/trends', asyncHandler(async (req: Request, res: Response) => {
        const { days } = trendsQuerySchema.parse(req.query);
        res.json(await analytics.getSkillTrends(req.params.skill, days));
    }));

    return router;
}
