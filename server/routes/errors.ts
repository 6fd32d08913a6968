import type { Response } from 'express';
import { z } from 'zod';

import { PlatformError, RateLimitExceededError, ValidationError } from '../errors';
import { getErrorMessage } from '../types/common';

export function formatValidationError(error: z.ZodError) {
  const { fieldErrors, formErrors } = error.flatten();
  return { fieldErrors, formErrors };
}

export function sendValidationError(res: Response, error: z.ZodError): void {
  res.status(400).json({
    success: false,
    error: 'Invalid request',
    code: 'INVALID_REQUEST',
    details: formatValidationError(error),
  });
}

/**
 * Answers with the status and code a {@link PlatformError} carries; anything
 * else is logged and reported as a 500.
 */
export function sendServiceError(res: Response, error: unknown, fallbackMessage: string): void {
  if (error instanceof PlatformError) {
    if (error instanceof RateLimitExceededError) {
      res.setHeader('Retry-After', String(Math.max(1, Math.ceil(error.retryAfterMs / 1000))));
    }
    res.status(error.statusCode).json({
      success: false,
      error: error.message,
      code: error.code,
      ...(error instanceof ValidationError && error.details.length > 0 ? { details: error.details } : {}),
    });
    return;
  }

  console.error(`❌ ${fallbackMessage}:`, error);
  res.status(500).json({ success: false, error: fallbackMessage, code: 'INTERNAL_ERROR', message: getErrorMessage(error) });
}
