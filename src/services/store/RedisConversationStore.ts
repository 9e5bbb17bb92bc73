// src/services/store/RedisConversationStore.ts

import type Redis from 'ioredis';
import { z } from 'zod';
import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import { ROLES, type ConversationLog, type Message } from '../../models/chat.model';
import { StoreError, errorMessage } from '../../errors';
import type { ConversationStore } from './types';

const storedMessageSchema = z.object({
    role: z.enum(ROLES),
    content: z.string(),
    timestamp: z.string().datetime(),
});

const metadataSchema = z.record(z.unknown());

export interface RedisConversationStoreConfig extends ServiceConfig {
    redis: Redis;
}

/**
 * Keeps each session as a hash (`chat_log:{id}`: created_at, updated_at,
 * metadata) plus a list of JSON-encoded messages (`chat_log:{id}:messages`).
 */
export class RedisConversationStore extends BaseService implements ConversationStore {
    private redis: Redis;
    private readonly KEY_PREFIX = 'chat_log:';

    constructor(config: RedisConversationStoreConfig) {
        super(config);
        this.redis = config.redis;
    }

    async connect(): Promise<void> {
        try {
            await this.redis.ping();
            this.logger.info('Connected to Redis');
        } catch (error) {
            throw new StoreError(`Failed to connect to Redis: ${errorMessage(error)}`, { cause: error });
        }
    }

    async close(): Promise<void> {
        await this.redis.quit();
        this.logger.info('Disconnected from Redis');
    }

    async getRecentMessages(sessionId: string, limit: number): Promise<Message[]> {
        if (limit <= 0) return [];
        let raw: string[];
        try {
            raw = await this.redis.lrange(this.messagesKey(sessionId), -limit, -1);
        } catch (error) {
            throw new StoreError(`Failed to read recent messages: ${errorMessage(error)}`, { cause: error });
        }
        return raw.map((entry) => this.parseMessage(sessionId, entry));
    }

    async appendMessages(sessionId: string, messages: Message[], at: Date): Promise<void> {
        if (messages.length === 0) return;
        const key = this.logKey(sessionId);
        const iso = at.toISOString();

        let results: [Error | null, unknown][] | null;
        try {
            results = await this.redis
                .multi()
                .rpush(this.messagesKey(sessionId), ...messages.map(serializeMessage))
                .hsetnx(key, 'created_at', iso)
                .hset(key, 'updated_at', iso)
                .exec();
        } catch (error) {
            throw new StoreError(`Failed to append messages: ${errorMessage(error)}`, { cause: error });
        }

        if (!results) {
            throw new StoreError('Failed to append messages: transaction was aborted');
        }
        const failed = results.find(([err]) => err !== null);
        if (failed?.[0]) {
            throw new StoreError(`Failed to append messages: ${failed[0].message}`, { cause: failed[0] });
        }
    }

    async getConversation(sessionId: string): Promise<ConversationLog | null> {
        let meta: Record<string, string>;
        let raw: string[];
        try {
            [meta, raw] = await Promise.all([
                this.redis.hgetall(this.logKey(sessionId)),
                this.redis.lrange(this.messagesKey(sessionId), 0, -1),
            ]);
        } catch (error) {
            throw new StoreError(`Failed to read conversation: ${errorMessage(error)}`, { cause: error });
        }

        if (!meta.created_at) return null;

        const log: ConversationLog = {
            sessionId,
            messages: raw.map((entry) => this.parseMessage(sessionId, entry)),
            createdAt: new Date(meta.created_at),
            updatedAt: new Date(meta.updated_at ?? meta.created_at),
        };
        if (meta.metadata) {
            try {
                log.metadata = metadataSchema.parse(JSON.parse(meta.metadata));
            } catch (error) {
                throw new StoreError(`Corrupt metadata for session ${sessionId}`, { cause: error });
            }
        }
        return log;
    }

    private parseMessage(sessionId: string, entry: string): Message {
        try {
            const parsed = storedMessageSchema.parse(JSON.parse(entry));
            return { role: parsed.role, content: parsed.content, timestamp: new Date(parsed.timestamp) };
        } catch (error) {
            this.logger.error('Corrupt message entry in Redis', { sessionId, error: errorMessage(error) });
            throw new StoreError(`Corrupt message entry for session ${sessionId}`, { cause: error });
        }
    }

    private logKey(sessionId: string): string {
        return `${this.KEY_PREFIX}${sessionId}`;
    }

    private messagesKey(sessionId: string): string {
        return `${this.KEY_PREFIX}${sessionId}:messages`;
    }
}

export function serializeMessage(msg: Message): string {
    return JSON.stringify({ role: msg.role, content: msg.content, timestamp: msg.timestamp.toISOString() });
}
