// src/routes/chat.ts

import express, { Request, Response } from 'express';
import type { ChatService } from '../services/chat.service';
import type { Logger } from '../services/base/types';
import {
    chatRequestSchema,
    toChatInput,
    toChatResponse,
    toConversationLogJSON,
} from '../models/chat.model';
import { errorMessage } from '../errors';

export function createChatRouter(chatService: ChatService, logger: Logger): express.Router {
    const router = express.Router();

    /**
     * POST /chat
     * Send a message and receive the assistant's reply. Omit session_id to start a new session.
     */
    router.post('/', async (req: Request, res: Response) => {
        const parsed = chatRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: 'Invalid chat request', issues: parsed.error.issues });
            return;
        }

        try {
            const result = await chatService.processChat(toChatInput(parsed.data));
            res.json(toChatResponse(result));
        } catch (error) {
            logger.error('Error processing chat', {
                sessionId: parsed.data.session_id,
                error: errorMessage(error),
            });
            res.status(500).json({ error: 'Error processing chat' });
        }
    });

    /**
     * GET /chat/history/:sessionId
     * Full message log of a session.
     */
    router.get('/history/:sessionId', async (req: Request, res: Response) => {
        try {
            const history = await chatService.getChatHistory(req.params.sessionId);
            if (!history) {
                res.status(404).json({ error: 'Chat history not found' });
                return;
            }
            res.json(toConversationLogJSON(history));
        } catch (error) {
            logger.error('Failed to fetch chat history', {
                sessionId: req.params.sessionId,
                error: errorMessage(error),
            });
            res.status(500).json({ error: 'Failed to fetch chat history' });
        }
    });

    return router;
}
