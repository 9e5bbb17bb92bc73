// src/routes/research.ts

import express, { Request, Response } from 'express';
import { z } from 'zod';
import type { ResearchPlanner } from '../services/research/ResearchPlanner';
import type { Logger } from '../services/base/types';
import { SchemaValidationError, errorMessage } from '../errors';

const planRequestSchema = z.object({
    query: z.string().trim().min(1, 'query is required'),
});

export function createResearchRouter(planner: ResearchPlanner, logger: Logger): express.Router {
    const router = express.Router();

    /**
     * POST /research/plan
     * Break a research question into 3-6 web searches.
     */
    router.post('/plan', async (req: Request, res: Response) => {
        const parsed = planRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: 'Invalid plan request', issues: parsed.error.issues });
            return;
        }

        try {
            const plan = await planner.plan(parsed.data.query);
            res.json(plan);
        } catch (error) {
            if (error instanceof SchemaValidationError) {
                logger.warn('Planner returned an invalid plan', { issues: error.issues, error: error.message });
                res.status(error.statusCode).json({ error: 'Planner returned an invalid plan', issues: error.issues });
                return;
            }
            logger.error('Failed to plan research', { error: errorMessage(error) });
            res.status(500).json({ error: 'Failed to plan research' });
        }
    });

    return router;
}
