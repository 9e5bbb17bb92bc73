// src/services/store/types.ts

import type { ConversationLog, Message } from '../../models/chat.model';

/**
 * Persistence for per-session message logs. One log per session id, created
 * on first append, append-only afterwards.
 */
export interface ConversationStore {
    connect(): Promise<void>;
    close(): Promise<void>;
    /** The last `limit` messages of a session, oldest first. Empty for an unknown session. */
    getRecentMessages(sessionId: string, limit: number): Promise<Message[]>;
    /**
     * Appends `messages` in order as one atomic upsert. Sets `updatedAt` to `at`,
     * and `createdAt` to `at` only when the log is created.
     */
    appendMessages(sessionId: string, messages: Message[], at: Date): Promise<void>;
    getConversation(sessionId: string): Promise<ConversationLog | null>;
}
