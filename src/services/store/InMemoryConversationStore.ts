// src/services/store/InMemoryConversationStore.ts

import type { ConversationLog, Message } from '../../models/chat.model';
import type { ConversationStore } from './types';

const copyMessage = (msg: Message): Message => ({
    role: msg.role,
    content: msg.content,
    timestamp: new Date(msg.timestamp.getTime()),
});

/** Process-local store. Used by the test suite and `CONVERSATION_STORE=memory`. */
export class InMemoryConversationStore implements ConversationStore {
    private logs = new Map<string, ConversationLog>();

    async connect(): Promise<void> {}

    async close(): Promise<void> {
        this.logs.clear();
    }

    async getRecentMessages(sessionId: string, limit: number): Promise<Message[]> {
        const log = this.logs.get(sessionId);
        if (!log || limit <= 0) return [];
        return log.messages.slice(-limit).map(copyMessage);
    }

    async appendMessages(sessionId: string, messages: Message[], at: Date): Promise<void> {
        const existing = this.logs.get(sessionId);
        if (existing) {
            existing.messages.push(...messages.map(copyMessage));
            existing.updatedAt = new Date(at.getTime());
            return;
        }
        this.logs.set(sessionId, {
            sessionId,
            messages: messages.map(copyMessage),
            createdAt: new Date(at.getTime()),
            updatedAt: new Date(at.getTime()),
        });
    }

    async getConversation(sessionId: string): Promise<ConversationLog | null> {
        const log = this.logs.get(sessionId);
        if (!log) return null;
        return {
            ...log,
            messages: log.messages.map(copyMessage),
            createdAt: new Date(log.createdAt.getTime()),
            updatedAt: new Date(log.updatedAt.getTime()),
        };
    }
}
