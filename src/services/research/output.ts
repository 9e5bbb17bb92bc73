// src/services/research/output.ts

import type { z } from 'zod';
import { SchemaValidationError, errorMessage } from '../../errors';

/**
 * How an agent's raw completion text becomes its typed output. Structured
 * outputs carry an authored schema description that is shown to the model,
 * and a validator that is applied to the reply.
 */
export interface OutputSpec<T> {
    name: string;
    instruction?: string;
    parse(raw: string): T;
}

export const textOutput: OutputSpec<string> = {
    name: 'text',
    parse: (raw) => raw,
};

export function jsonOutput<T>(
    name: string,
    schemaDescription: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
): OutputSpec<T> {
    return {
        name,
        instruction: `You must respond with valid JSON matching this schema: ${schemaDescription}`,
        parse(raw: string): T {
            const json = extractJsonObject(raw);
            if (json === null) {
                throw new SchemaValidationError(name, `${name}: response did not contain a JSON object`);
            }

            let data: unknown;
            try {
                data = JSON.parse(json);
            } catch (error) {
                throw new SchemaValidationError(name, `${name}: response is not valid JSON (${errorMessage(error)})`, [], { cause: error });
            }

            const result = schema.safeParse(data);
            if (!result.success) {
                throw new SchemaValidationError(name, `${name}: response does not match the schema`, result.error.issues);
            }
            return result.data;
        },
    };
}

/** The span from the first `{` to the last `}`, tolerating prose or fences around it. */
export function extractJsonObject(text: string): string | null {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start < 0 || end <= start) return null;
    return text.slice(start, end + 1);
}
