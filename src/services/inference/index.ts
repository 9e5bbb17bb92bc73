// src/services/inference/index.ts

import type { AppConfig } from '../../config';
import type { Logger } from '../base/types';
import { GroqInferenceClient } from './GroqInferenceClient';
import { OpenAIInferenceClient } from './OpenAIInferenceClient';
import type { InferenceClient } from './types';

export function createInferenceClient(config: AppConfig, logger: Logger): InferenceClient {
    const defaults = {
        model: config.MODEL_NAME,
        temperature: config.DEFAULT_TEMPERATURE,
        maxTokens: config.MAX_TOKENS,
    };

    switch (config.INFERENCE_PROVIDER) {
        case 'groq':
            return new GroqInferenceClient({ logger, defaults, apiKey: config.GROQ_API_KEY });
        case 'openai':
            return new OpenAIInferenceClient({ logger, defaults, apiKey: config.OPENAI_API_KEY });
    }
}

export type { InferenceClient, GenerateOptions, GenerateResult } from './types';
