import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import {
  LlmError,
  PersistenceError,
  SchemaValidationError,
} from '@newscheck/shared/src/utils/errors.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ZodError) {
    const details = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details,
    };
    return c.json(body, 400);
  }

  if (err instanceof HTTPException && err.status === 400) {
    const body: ErrorResponse = {
      error: 'Malformed request body',
      code: 'INVALID_REQUEST',
      requestId,
    };
    return c.json(body, 400);
  }

  if (err instanceof LlmError) {
    log.error({ requestId, error: err.message }, 'LLM error');
    const body: ErrorResponse = {
      error: 'Language model processing failed',
      code: 'LLM_ERROR',
      requestId,
    };
    return c.json(body, 502);
  }

  if (err instanceof SchemaValidationError) {
    log.error({ requestId, error: err.message, details: err.validationErrors }, 'Stored data is invalid');
    const body: ErrorResponse = {
      error: 'Stored results are invalid',
      code: 'INVALID_STORED_RESULTS',
      requestId,
    };
    return c.json(body, 500);
  }

  if (err instanceof PersistenceError) {
    log.error({ requestId, error: err.message }, 'Persistence error');
    const body: ErrorResponse = {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
      requestId,
    };
    return c.json(body, 500);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
