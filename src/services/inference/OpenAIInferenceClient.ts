// src/services/inference/OpenAIInferenceClient.ts

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { ChatTurn } from '../../models/chat.model';
import { BaseInferenceClient, type InferenceClientConfig } from './BaseInferenceClient';
import type { CompletionRequest, RawCompletion } from './types';

export interface OpenAIInferenceClientConfig extends InferenceClientConfig {
    apiKey: string;
}

export class OpenAIInferenceClient extends BaseInferenceClient {
    protected readonly provider = 'OpenAI';
    private client: OpenAI;

    constructor(config: OpenAIInferenceClientConfig) {
        super(config);
        if (!config.apiKey) throw new Error('OpenAI API key is missing.');
        this.client = new OpenAI({ apiKey: config.apiKey.trim() });
    }

    protected async complete(request: CompletionRequest): Promise<RawCompletion> {
        const response = await this.client.chat.completions.create({
            model: request.model,
            messages: request.messages.map(toOpenAIMessage),
            temperature: request.temperature,
            max_tokens: request.maxTokens,
            top_p: request.topP,
            presence_penalty: request.presencePenalty,
            frequency_penalty: request.frequencyPenalty,
        });

        return {
            content: response.choices[0]?.message?.content,
            usage: response.usage,
        };
    }
}

function toOpenAIMessage(turn: ChatTurn): ChatCompletionMessageParam {
    switch (turn.role) {
        case 'system':
            return { role: 'system', content: turn.content };
        case 'assistant':
            return { role: 'assistant', content: turn.content };
        case 'user':
            return { role: 'user', content: turn.content };
    }
}
