// src/services/store/index.ts

import Redis from 'ioredis';
import type { AppConfig } from '../../config';
import type { Logger } from '../base/types';
import { InMemoryConversationStore } from './InMemoryConversationStore';
import { MongoConversationStore } from './MongoConversationStore';
import { RedisConversationStore } from './RedisConversationStore';
import type { ConversationStore } from './types';

export function createConversationStore(config: AppConfig, logger: Logger): ConversationStore {
    switch (config.CONVERSATION_STORE) {
        case 'mongodb':
            return new MongoConversationStore({ logger, url: config.MONGODB_URL, databaseName: config.DATABASE_NAME });
        case 'redis':
            return new RedisConversationStore({ logger, redis: new Redis(config.REDIS_URL, { lazyConnect: true }) });
        case 'memory':
            logger.warn('Using in-memory conversation store; history is lost on restart');
            return new InMemoryConversationStore();
    }
}

export type { ConversationStore } from './types';
export { InMemoryConversationStore } from './InMemoryConversationStore';
