// src/app.ts

import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { ChatService } from './services/chat.service';
import type { ResearchPlanner } from './services/research/ResearchPlanner';
import type { Logger } from './services/base/types';
import { createChatRouter } from './routes/chat';
import { createResearchRouter } from './routes/research';
import { errorMessage } from './errors';

export interface AppDependencies {
    chatService: ChatService;
    planner: ResearchPlanner;
    logger: Logger;
    apiVersion?: string;
    corsOrigins?: string[];
}

export function createApp(deps: AppDependencies): express.Express {
    const { logger } = deps;
    const app = express();

    const origins = deps.corsOrigins ?? ['*'];
    app.use(cors({
        origin: origins.includes('*') ? true : origins,
        credentials: true,
    }));
    app.use(express.json({ limit: '1mb' }));

    const chatRouter = createChatRouter(deps.chatService, logger);
    app.use('/chat', chatRouter);
    app.use(`/api/${deps.apiVersion ?? 'v1'}/chat`, chatRouter);
    app.use('/research', createResearchRouter(deps.planner, logger));

    // Health check
    app.get('/health', (_req, res) => {
        res.json({ status: 'healthy', timestamp: new Date().toISOString() });
    });

    // Body-parser failures and anything a router let through
    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof SyntaxError) {
            res.status(400).json({ error: 'Malformed JSON body' });
            return;
        }
        const status = clientErrorStatus(err);
        if (status !== undefined) {
            logger.warn('Rejected request', { path: req.path, status, error: errorMessage(err) });
            res.status(status).json({ error: errorMessage(err) });
            return;
        }
        logger.error('Unhandled request error', { path: req.path, error: errorMessage(err) });
        res.status(500).json({ error: 'Internal server error' });
    });

    return app;
}

// body-parser errors (413 too large, 415 bad charset) carry their own 4xx status
function clientErrorStatus(err: unknown): number | undefined {
    if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
    const { status } = err;
    return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}
