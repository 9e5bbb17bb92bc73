// src/models/chat.model.ts

import { z } from 'zod';

export const ROLES = ['user', 'assistant', 'system'] as const;
export type Role = (typeof ROLES)[number];

export interface ChatTurn {
    role: Role;
    content: string;
}

export interface Message extends ChatTurn {
    timestamp: Date;
}

export interface ConversationLog {
    sessionId: string;
    messages: Message[];
    createdAt: Date;
    updatedAt: Date;
    metadata?: Record<string, unknown>;
}

export interface TokenUsage {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
}

export interface ChatInput {
    message: string;
    sessionId?: string;
    context?: ChatTurn[];
    systemPrompt?: string;
    temperature?: number;
    maxTokens?: number;
}

export interface ChatResult {
    response: string;
    sessionId: string;
    timestamp: Date;
    usage: TokenUsage;
}

// --- Wire format (snake_case JSON) ---

export const chatTurnSchema = z.object({
    role: z.enum(ROLES),
    content: z.string(),
});

export const chatRequestSchema = z.object({
    message: z.string().min(1, 'message must not be empty'),
    // an empty id counts as absent and starts a new session
    session_id: z.string().optional(),
    context: z.array(chatTurnSchema).optional(),
    system_prompt: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
    max_tokens: z.number().int().min(1).max(4000).optional(),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

export interface ChatResponse {
    response: string;
    session_id: string;
    timestamp: string;
    usage?: Record<string, number>;
}

export interface MessageJSON {
    role: Role;
    content: string;
    timestamp: string;
}

export interface ConversationLogJSON {
    session_id: string;
    messages: MessageJSON[];
    created_at: string;
    updated_at: string;
    metadata?: Record<string, unknown>;
}

export function toChatInput(request: ChatRequest): ChatInput {
    return {
        message: request.message,
        sessionId: request.session_id,
        context: request.context,
        systemPrompt: request.system_prompt,
        temperature: request.temperature,
        maxTokens: request.max_tokens,
    };
}

export function toChatResponse(result: ChatResult): ChatResponse {
    return {
        response: result.response,
        session_id: result.sessionId,
        timestamp: result.timestamp.toISOString(),
        usage: { ...result.usage },
    };
}

export function toConversationLogJSON(log: ConversationLog): ConversationLogJSON {
    const json: ConversationLogJSON = {
        session_id: log.sessionId,
        messages: log.messages.map((msg) => ({
            role: msg.role,
            content: msg.content,
            timestamp: msg.timestamp.toISOString(),
        })),
        created_at: log.createdAt.toISOString(),
        updated_at: log.updatedAt.toISOString(),
    };
    if (log.metadata) json.metadata = log.metadata;
    return json;
}
