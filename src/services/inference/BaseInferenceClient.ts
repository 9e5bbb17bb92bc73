// src/services/inference/BaseInferenceClient.ts

import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import type { ChatTurn } from '../../models/chat.model';
import { InferenceError, errorMessage } from '../../errors';
import { DEFAULT_SYSTEM_PROMPT } from './prompts/defaultSystemPrompt';
import type {
    CompletionRequest,
    GenerateOptions,
    GenerateResult,
    InferenceClient,
    InferenceDefaults,
    RawCompletion,
} from './types';

const PRESENCE_PENALTY = 0.6;
const FREQUENCY_PENALTY = 0.3;

export interface InferenceClientConfig extends ServiceConfig {
    defaults: InferenceDefaults;
}

export abstract class BaseInferenceClient extends BaseService implements InferenceClient {
    protected readonly defaults: InferenceDefaults;

    /** Provider label used in logs and error messages. */
    protected abstract readonly provider: string;

    constructor(config: InferenceClientConfig) {
        super(config);
        this.defaults = config.defaults;
    }

    protected abstract complete(request: CompletionRequest): Promise<RawCompletion>;

    public async generate(conversation: ChatTurn[], options: GenerateOptions = {}): Promise<GenerateResult> {
        const request: CompletionRequest = {
            model: options.model ?? this.defaults.model,
            messages: withDefaultSystemPrompt(conversation),
            temperature: options.temperature ?? this.defaults.temperature,
            maxTokens: options.maxTokens ?? this.defaults.maxTokens,
            topP: options.topP,
            presencePenalty: PRESENCE_PENALTY,
            frequencyPenalty: FREQUENCY_PENALTY,
        };

        const startedAt = Date.now();
        let raw: RawCompletion;
        try {
            raw = await this.complete(request);
        } catch (error) {
            this.logger.error('Inference request failed', {
                provider: this.provider,
                model: request.model,
                error: errorMessage(error),
            });
            throw new InferenceError(`${this.provider} API error: ${errorMessage(error)}`, { cause: error });
        }

        if (typeof raw.content !== 'string') {
            throw new InferenceError(`${this.provider} returned a completion without content`);
        }

        const usage = {
            prompt_tokens: raw.usage?.prompt_tokens ?? 0,
            completion_tokens: raw.usage?.completion_tokens ?? 0,
            total_tokens: raw.usage?.total_tokens ?? 0,
        };

        this.logger.debug('Inference request completed', {
            provider: this.provider,
            model: request.model,
            durationMs: Date.now() - startedAt,
            totalTokens: usage.total_tokens,
        });

        return { content: raw.content, usage };
    }
}

/**
 * Returns a copy of the conversation that starts with a system message,
 * prepending the default guidelines when the caller supplied none.
 */
export function withDefaultSystemPrompt(conversation: ChatTurn[]): ChatTurn[] {
    if (conversation.length > 0 && conversation[0].role === 'system') {
        return [...conversation];
    }
    return [{ role: 'system', content: DEFAULT_SYSTEM_PROMPT }, ...conversation];
}
