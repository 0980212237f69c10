/**
 * Response collection
 * - score validation (1-4 only)
 * - question id checks against the catalog
 * - upsert by question_id, last write wins
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { CatalogReader } from './catalog';
import { InvalidScoreError, UnknownQuestionError } from './errors';
import type { Response, Score } from './types';

export const NOTE_MAX_LENGTH = 2000;

const isScore = (n: number): n is Score => n === 1 || n === 2 || n === 3 || n === 4;

/**
 * Coerces a submitted score to 1-4 or throws InvalidScoreError.
 * Form posts send "3", so single-digit strings are accepted.
 */
export function validateScore(value: unknown, questionId?: string): Score {
  let num: number | null = null;
  if (typeof value === 'number') {
    num = value;
  } else if (typeof value === 'string' && /^\s*\d\s*$/.test(value)) {
    num = Number(value.trim());
  }
  if (num == null || !Number.isInteger(num) || !isScore(num)) {
    throw new InvalidScoreError(value, questionId);
  }
  return num;
}

export const responseInputSchema = z.object({
  question_id: z.string().trim().min(1),
  score: z.union([z.number(), z.string()]),
  note: z
    .string()
    .trim()
    .transform(s => s.slice(0, NOTE_MAX_LENGTH))
    .optional(),
  response_time_seconds: z.number().int().nonnegative().optional(),
});

export type ResponseInput = z.infer<typeof responseInputSchema>;

export const submitResponsesSchema = z.object({
  responses: z.array(responseInputSchema).min(1),
});

/**
 * Validates raw answers and turns them into Response records
 */
export function collectResponses(
  catalog: CatalogReader,
  assessmentId: string,
  inputs: ResponseInput[],
  now: Date = new Date(),
): Response[] {
  const timestamp = now.toISOString();
  return inputs.map(input => {
    const question = catalog.getQuestion(input.question_id);
    if (!question) {
      throw new UnknownQuestionError(input.question_id);
    }
    if (!question.active) {
      throw new UnknownQuestionError(input.question_id, true);
    }
    const response: Response = {
      response_id: uuidv4(),
      assessment_id: assessmentId,
      question_id: question.question_id,
      score: validateScore(input.score, input.question_id),
      timestamp,
    };
    if (input.note) response.note = input.note;
    if (input.response_time_seconds != null) {
      response.response_time_seconds = input.response_time_seconds;
    }
    return response;
  });
}

/**
 * Upserts incoming responses by question_id.
 * A replaced answer keeps its response_id and its position.
 */
export function mergeResponses(existing: Response[], incoming: Response[]): Response[] {
  const map = new Map<string, Response>();
  for (const r of existing) {
    map.set(r.question_id, r);
  }
  for (const r of incoming) {
    const prev = map.get(r.question_id);
    map.set(r.question_id, prev ? { ...r, response_id: prev.response_id } : r);
  }
  return Array.from(map.values());
}

export function toResponseMap(responses: Response[]): Map<string, Score> {
  return new Map(responses.map(r => [r.question_id, r.score]));
}
