/**
 * Error types raised by the assessment application.
 * Each carries the HTTP status the route handlers answer with.
 */

import type { z } from 'zod';

export class AssessmentError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, code = 'ASSESSMENT_ERROR', status = 400) {
    super(message);
    this.name = 'AssessmentError';
    this.code = code;
    this.status = status;
  }
}

export class ValidationError extends AssessmentError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** A score outside {1,2,3,4} offered to the response collector. */
export class InvalidScoreError extends AssessmentError {
  readonly questionId: string | undefined;
  readonly value: unknown;

  constructor(value: unknown, questionId?: string) {
    super(
      `Invalid score ${JSON.stringify(value)}${questionId ? ` for question ${questionId}` : ''} (must be 1-4)`,
      'INVALID_SCORE',
      400,
    );
    this.name = 'InvalidScoreError';
    this.questionId = questionId;
    this.value = value;
  }
}

export class UnknownQuestionError extends AssessmentError {
  readonly questionId: string;

  constructor(questionId: string, inactive = false) {
    super(
      inactive ? `Question ${questionId} is not active` : `Question ${questionId} not found`,
      'UNKNOWN_QUESTION',
      400,
    );
    this.name = 'UnknownQuestionError';
    this.questionId = questionId;
  }
}

export class AssessmentNotFoundError extends AssessmentError {
  constructor(assessmentId: string) {
    super(`Assessment ${assessmentId} not found`, 'NOT_FOUND', 404);
    this.name = 'AssessmentNotFoundError';
  }
}

export class AssessmentCompletedError extends AssessmentError {
  constructor(assessmentId: string) {
    super(`Assessment ${assessmentId} is completed and cannot be modified`, 'COMPLETED', 409);
    this.name = 'AssessmentCompletedError';
  }
}

export class IncompleteAssessmentError extends AssessmentError {
  readonly percentage: number;
  readonly threshold: number;

  constructor(percentage: number, threshold: number) {
    super(
      `Assessment is ${percentage}% complete; at least ${threshold}% is required (or force completion)`,
      'INCOMPLETE',
      400,
    );
    this.name = 'IncompleteAssessmentError';
    this.percentage = percentage;
    this.threshold = threshold;
  }
}

export class NotScoreableError extends AssessmentError {
  constructor(assessmentId: string, reason: string) {
    super(`Assessment ${assessmentId} is not scoreable: ${reason}`, 'NOT_SCOREABLE', 409);
    this.name = 'NotScoreableError';
  }
}

export class CatalogError extends AssessmentError {
  constructor(message: string) {
    super(message, 'CATALOG_ERROR', 500);
    this.name = 'CatalogError';
  }
}

/**
 * Parses input with a zod schema, raising ValidationError with readable issues
 */
export function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  message = 'Invalid request',
): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
    throw new ValidationError(message, issues);
  }
  return parsed.data;
}
