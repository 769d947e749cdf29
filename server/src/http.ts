import type { Response } from 'express';
import type { z } from 'zod';
import { LedgerFailure, ValidationFailure, type FailureKind } from '../../src/domain/errors.js';

const STATUS_BY_KIND: Record<FailureKind, number> = {
  validation: 400,
  not_found: 404,
  conflict: 409,
  batch: 500,
};

/** Validate a request payload, turning zod issues into a ValidationFailure */
export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationFailure(details);
  }
  return result.data;
}

/** Errors raised by body-parser carry an HTTP status */
function clientHttpError(error: unknown): { status: number; message: string } | null {
  if (!(error instanceof Error) || !('status' in error)) return null;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500
    ? { status, message: error.message }
    : null;
}

/**
 * Answer with the status of a known failure, or log and answer 500.
 */
export function sendError(res: Response, error: unknown, fallbackMessage: string): void {
  if (error instanceof LedgerFailure) {
    res.status(STATUS_BY_KIND[error.kind]).json({ error: error.message });
    return;
  }

  const clientError = clientHttpError(error);
  if (clientError) {
    res.status(clientError.status).json({ error: clientError.message });
    return;
  }

  console.error(`${fallbackMessage}:`, error);
  res.status(500).json({ error: fallbackMessage });
}
