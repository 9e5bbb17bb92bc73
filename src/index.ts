// src/index.ts

import { createServer } from 'http';
import { initialiseEnv, loadConfig } from './config';
import logger from './utils/logger';
import { createApp } from './app';
import { createInferenceClient } from './services/inference';
import { createConversationStore } from './services/store';
import { createResearchPlanner } from './services/research';
import { ChatService } from './services/chat.service';
import { errorMessage } from './errors';

async function main(): Promise<void> {
    initialiseEnv();
    const config = loadConfig();

    // --- Service Initialization ---
    const inference = createInferenceClient(config, logger);
    const store = createConversationStore(config, logger);
    await store.connect();

    const chatService = new ChatService({
        logger,
        inference,
        store,
        historyWindow: config.HISTORY_WINDOW,
    });
    const planner = createResearchPlanner(config, inference, logger);

    const app = createApp({
        chatService,
        planner,
        logger,
        apiVersion: config.API_VERSION,
        corsOrigins: config.CORS_ORIGINS,
    });

    const server = createServer(app);
    server.listen(config.PORT, () => {
        logger.info(`${config.PROJECT_NAME} listening`, {
            port: config.PORT,
            provider: config.INFERENCE_PROVIDER,
            store: config.CONVERSATION_STORE,
        });
    });

    const shutdown = (signal: string) => {
        logger.info('Shutting down', { signal });
        server.close(() => {
            store
                .close()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    logger.error('Failed to close conversation store', { error: errorMessage(error) });
                    process.exit(1);
                });
        });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
    logger.error('Fatal error during start-up', { error: errorMessage(error) });
    process.exit(1);
});
