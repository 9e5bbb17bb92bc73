// src/services/inference/GroqInferenceClient.ts

import Groq from 'groq-sdk';
import type { ChatCompletionMessageParam } from 'groq-sdk/resources/chat/completions';
import type { ChatTurn } from '../../models/chat.model';
import { BaseInferenceClient, type InferenceClientConfig } from './BaseInferenceClient';
import type { CompletionRequest, RawCompletion } from './types';

export interface GroqInferenceClientConfig extends InferenceClientConfig {
    apiKey: string;
}

export class GroqInferenceClient extends BaseInferenceClient {
    protected readonly provider = 'Groq';
    private client: Groq;

    constructor(config: GroqInferenceClientConfig) {
        super(config);
        if (!config.apiKey || config.apiKey.trim() === '') {
            throw new Error('GROQ_API_KEY is required but was not provided');
        }
        this.client = new Groq({ apiKey: config.apiKey.trim() });
    }

    protected async complete(request: CompletionRequest): Promise<RawCompletion> {
        const response = await this.client.chat.completions.create({
            model: request.model,
            messages: request.messages.map(toGroqMessage),
            temperature: request.temperature,
            max_tokens: request.maxTokens,
            top_p: request.topP,
            presence_penalty: request.presencePenalty,
            frequency_penalty: request.frequencyPenalty,
            stream: false,
        });

        return {
            content: response.choices[0]?.message?.content,
            usage: response.usage,
        };
    }
}

function toGroqMessage(turn: ChatTurn): ChatCompletionMessageParam {
    switch (turn.role) {
        case 'system':
            return { role: 'system', content: turn.content };
        case 'assistant':
            return { role: 'assistant', content: turn.content };
        case 'user':
            return { role: 'user', content: turn.content };
    }
}
