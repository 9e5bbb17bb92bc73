// src/services/chat.service.ts

import { v4 as uuidv4 } from 'uuid';
import { BaseService } from './base/BaseService';
import type { ServiceConfig } from './base/types';
import type { InferenceClient } from './inference/types';
import type { ConversationStore } from './store/types';
import type { ChatInput, ChatResult, ChatTurn, ConversationLog, Message } from '../models/chat.model';
import { errorMessage } from '../errors';

export const DEFAULT_HISTORY_WINDOW = 10;

export interface ChatServiceConfig extends ServiceConfig {
    inference: InferenceClient;
    store: ConversationStore;
    historyWindow?: number;
    generateSessionId?: () => string;
    now?: () => Date;
}

export class ChatService extends BaseService {
    private inference: InferenceClient;
    private store: ConversationStore;
    private historyWindow: number;
    private generateSessionId: () => string;
    private now: () => Date;

    constructor(config: ChatServiceConfig) {
        super(config);
        this.inference = config.inference;
        this.store = config.store;
        this.historyWindow = config.historyWindow ?? DEFAULT_HISTORY_WINDOW;
        this.generateSessionId = config.generateSessionId ?? uuidv4;
        this.now = config.now ?? (() => new Date());
    }

    /**
     * Runs one chat exchange: builds the conversation, calls inference, then
     * appends the user message and the reply. Nothing is stored if any step
     * before the append fails.
     */
    public async processChat(input: ChatInput): Promise<ChatResult> {
        const sessionId = input.sessionId || this.generateSessionId();
        const startedAt = Date.now();

        const conversation = await this.prepareMessages(sessionId, input);

        const generated = await this.inference.generate(conversation, {
            temperature: input.temperature,
            maxTokens: input.maxTokens,
        });

        const timestamp = this.now();
        const exchange: Message[] = [
            { role: 'user', content: input.message, timestamp },
            { role: 'assistant', content: generated.content, timestamp },
        ];
        await this.store.appendMessages(sessionId, exchange, timestamp);

        this.logger.info('Chat message processed', {
            sessionId,
            historyMessages: conversation.length,
            totalTokens: generated.usage.total_tokens,
            durationMs: Date.now() - startedAt,
        });

        return {
            response: generated.content,
            sessionId,
            timestamp,
            usage: generated.usage,
        };
    }

    /**
     * Conversation order: system prompt, recent stored history (oldest first),
     * caller context, then the new user message.
     */
    public async prepareMessages(sessionId: string, input: ChatInput): Promise<ChatTurn[]> {
        const messages: ChatTurn[] = [];

        if (input.systemPrompt) {
            messages.push({ role: 'system', content: input.systemPrompt });
        }

        const history = await this.store.getRecentMessages(sessionId, this.historyWindow);
        for (const msg of history) {
            messages.push({ role: msg.role, content: msg.content });
        }

        if (input.context) {
            for (const turn of input.context) {
                messages.push({ role: turn.role, content: turn.content });
            }
        }

        messages.push({ role: 'user', content: input.message });
        return messages;
    }

    public async getChatHistory(sessionId: string): Promise<ConversationLog | null> {
        try {
            return await this.store.getConversation(sessionId);
        } catch (error) {
            this.logger.error('Failed to load chat history', { sessionId, error: errorMessage(error) });
            throw error;
        }
    }
}
