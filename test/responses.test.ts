import { describe, it, expect } from 'vitest';
import { InvalidScoreError, UnknownQuestionError } from '@/lib/errors';
import {
  collectResponses,
  mergeResponses,
  responseInputSchema,
  toResponseMap,
  validateScore,
} from '@/lib/responses';
import { answer, smallCatalog } from './fixtures';

describe('validateScore', () => {
  it('accepts the integers 1 to 4', () => {
    expect([1, 2, 3, 4].map(v => validateScore(v))).toEqual([1, 2, 3, 4]);
  });

  it('accepts single-digit strings from form posts', () => {
    expect(validateScore('3')).toBe(3);
    expect(validateScore(' 2 ')).toBe(2);
  });

  it.each([0, 5, 2.5, -1, '12', 'abc', '', null, undefined, true, NaN])('rejects %s', value => {
    expect(() => validateScore(value)).toThrow(InvalidScoreError);
  });

  it('names the question in the error', () => {
    expect(() => validateScore(9, 'A1-01')).toThrow('Invalid score 9 for question A1-01 (must be 1-4)');
  });
});

describe('responseInputSchema', () => {
  it('trims notes and caps them at 2000 characters', () => {
    expect(responseInputSchema.parse({ question_id: 'A1-01', score: 2, note: '  hello  ' }).note).toBe('hello');
    const long = responseInputSchema.parse({ question_id: 'A1-01', score: 2, note: 'x'.repeat(2500) });
    expect(long.note).toHaveLength(2000);
  });

  it('requires a question id', () => {
    expect(responseInputSchema.safeParse({ question_id: ' ', score: 2 }).success).toBe(false);
  });
});

describe('collectResponses', () => {
  const now = new Date('2026-02-01T12:00:00.000Z');

  it('builds response records for active questions', () => {
    const [r] = collectResponses(smallCatalog(), 'a-1', [{ question_id: 'A1-01', score: '4', note: 'ok' }], now);
    expect(r).toMatchObject({
      assessment_id: 'a-1',
      question_id: 'A1-01',
      score: 4,
      note: 'ok',
      timestamp: '2026-02-01T12:00:00.000Z',
    });
    expect(r.response_id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('rejects unknown questions', () => {
    expect(() => collectResponses(smallCatalog(), 'a-1', [{ question_id: 'Z-01', score: 2 }], now))
      .toThrow(new UnknownQuestionError('Z-01'));
  });

  it('rejects inactive questions', () => {
    expect(() => collectResponses(smallCatalog(), 'a-1', [{ question_id: 'A1-03', score: 2 }], now))
      .toThrow('Question A1-03 is not active');
  });

  it('rejects invalid scores', () => {
    expect(() => collectResponses(smallCatalog(), 'a-1', [{ question_id: 'A1-01', score: 0 }], now))
      .toThrow(InvalidScoreError);
  });
});

describe('mergeResponses', () => {
  it('replaces answers by question id, keeping id and position', () => {
    const existing = [answer('A1-01', 1), answer('A2-01', 2)];
    const incoming = [answer('A1-01', 4, '2026-01-02T00:00:00.000Z'), answer('B1-01', 3)];
    const merged = mergeResponses(existing, incoming);
    expect(merged.map(r => [r.question_id, r.score])).toEqual([
      ['A1-01', 4],
      ['A2-01', 2],
      ['B1-01', 3],
    ]);
    expect(merged[0].response_id).toBe(existing[0].response_id);
    expect(merged[0].timestamp).toBe('2026-01-02T00:00:00.000Z');
  });

  it('keeps the last of duplicate incoming answers', () => {
    const merged = mergeResponses([], [answer('A1-01', 1), answer('A1-01', 3)]);
    expect(merged).toHaveLength(1);
    expect(merged[0].score).toBe(3);
  });
});

describe('toResponseMap', () => {
  it('maps question ids to scores', () => {
    const map = toResponseMap([answer('A1-01', 2), answer('B1-01', 4)]);
    expect(map.get('A1-01')).toBe(2);
    expect(map.get('B1-01')).toBe(4);
    expect(map.size).toBe(2);
  });
});
