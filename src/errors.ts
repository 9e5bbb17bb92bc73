// src/errors.ts
import type { ZodIssue } from 'zod';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Request shape or range violation, rejected before any orchestration. */
export class ValidationError extends AppError {
  constructor(message: string, public readonly issues: ZodIssue[] = []) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

/** The inference API failed, or answered with something unusable. */
export class InferenceError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, 'INFERENCE_ERROR', options);
  }
}

export class StoreError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, 'STORE_ERROR', options);
  }
}

/** Structured model output that does not match the expected schema. */
export class SchemaValidationError extends AppError {
  constructor(
    public readonly outputName: string,
    message: string,
    public readonly issues: ZodIssue[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, 502, 'SCHEMA_VALIDATION_ERROR', options);
  }
}

export class SearchError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, 'SEARCH_ERROR', options);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, 'CONFIGURATION_ERROR');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
