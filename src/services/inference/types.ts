// src/services/inference/types.ts

import type { ChatTurn, TokenUsage } from '../../models/chat.model';

export interface GenerateOptions {
    temperature?: number;
    maxTokens?: number;
    model?: string;
    topP?: number;
}

export interface GenerateResult {
    content: string;
    usage: TokenUsage;
}

/**
 * A language-model completion capability. Implementations prepend the default
 * system message when the conversation does not start with one.
 */
export interface InferenceClient {
    generate(conversation: ChatTurn[], options?: GenerateOptions): Promise<GenerateResult>;
}

export interface InferenceDefaults {
    model: string;
    temperature: number;
    maxTokens: number;
}

/** Fully resolved request handed to a provider SDK. */
export interface CompletionRequest {
    model: string;
    messages: ChatTurn[];
    temperature: number;
    maxTokens: number;
    topP?: number;
    presencePenalty: number;
    frequencyPenalty: number;
}

export interface RawCompletion {
    content: string | null | undefined;
    usage?: {
        prompt_tokens?: number;
        completion_tokens?: number;
        total_tokens?: number;
    } | null;
}
