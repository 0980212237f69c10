/**
 * Scoring
 * - area mean → section mean (mean of area means) → overall (mean of section means)
 * - areas / sections without answers are null and left out of the parent mean
 * - responses that do not map to an active catalog question are excluded
 */

import type { CatalogReader } from './catalog';
import { classifyMaturity, SCORE_MAX, SCORE_MIN } from './maturity';
import { clamp, computeMean, roundTo } from './utils';
import type {
  AreaScore,
  ExcludedResponse,
  Response,
  ScoreOutcome,
  SectionScore,
} from './types';

export const SCORING_VERSION = '1.0';

const isValidScore = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= SCORE_MIN && value <= SCORE_MAX;

const coverageOf = (answered: number, total: number): number =>
  total > 0 ? Math.min(1, answered / total) : 0;

/**
 * Keeps the last usable score per active question
 */
function collectUsableScores(
  responses: Response[],
  catalog: CatalogReader,
): { scores: Map<string, number>; excluded: ExcludedResponse[] } {
  const scores = new Map<string, number>();
  const excluded: ExcludedResponse[] = [];

  for (const r of responses) {
    const question = catalog.getQuestion(r.question_id);
    if (!question) {
      console.warn(`Excluding response for unknown question ${r.question_id}`);
      excluded.push({ question_id: r.question_id, reason: 'unknown_question' });
      continue;
    }
    if (!question.active) {
      console.warn(`Excluding response for inactive question ${r.question_id}`);
      excluded.push({ question_id: r.question_id, reason: 'inactive_question' });
      continue;
    }
    if (!isValidScore(r.score)) {
      console.warn(`Excluding response with invalid score for ${r.question_id}:`, r.score);
      excluded.push({ question_id: r.question_id, reason: 'invalid_score' });
      continue;
    }
    scores.set(r.question_id, r.score);
  }

  return { scores, excluded };
}

function computeAreaScores(
  sectionId: string,
  catalog: CatalogReader,
  scores: Map<string, number>,
): AreaScore[] {
  return catalog.listAreas(sectionId).map(area => {
    const questions = catalog.listQuestions(area.area_id);
    const values = questions
      .map(q => scores.get(q.question_id))
      .filter((v): v is number => v !== undefined);
    return {
      area_id: area.area_id,
      area_name: area.area_name,
      section_id: sectionId,
      order: area.order,
      mean: computeMean(values),
      answered: values.length,
      total_questions: questions.length,
      coverage: coverageOf(values.length, questions.length),
    };
  });
}

function computeSectionScores(catalog: CatalogReader, scores: Map<string, number>): SectionScore[] {
  return catalog.listSections().map(section => {
    const areas = computeAreaScores(section.section_id, catalog, scores);
    const areaMeans = areas.map(a => a.mean).filter((m): m is number => m != null);
    const answered = areas.reduce((sum, a) => sum + a.answered, 0);
    const total = areas.reduce((sum, a) => sum + a.total_questions, 0);
    return {
      section_id: section.section_id,
      section_name: section.section_name,
      record_field: section.record_field,
      order: section.order,
      mean: computeMean(areaMeans),
      areas,
      answered,
      total_questions: total,
      coverage: coverageOf(answered, total),
    };
  });
}

/**
 * Computes area, section and overall scores from raw responses.
 * Pure: the same responses and catalog always give the same result.
 */
export function computeScores(responses: Response[], catalog: CatalogReader): ScoreOutcome {
  const { scores, excluded } = collectUsableScores(responses, catalog);
  const sections = computeSectionScores(catalog, scores);
  const answered = sections.reduce((sum, s) => sum + s.answered, 0);
  const totalQuestions = catalog.countActiveQuestions();

  const sectionMeans = sections.map(s => s.mean).filter((m): m is number => m != null);
  const overall = computeMean(sectionMeans);

  if (overall == null) {
    return {
      kind: 'not_scoreable',
      reason: 'No usable responses',
      sections,
      answered,
      total_questions: totalQuestions,
      excluded,
    };
  }

  const overallScore = roundTo(clamp(overall, SCORE_MIN, SCORE_MAX), 2);
  return {
    kind: 'scored',
    overall_score: overallScore,
    classification: classifyMaturity(overallScore),
    sections,
    answered,
    total_questions: totalQuestions,
    excluded,
  };
}

/**
 * All area scores in display order
 */
export function flattenAreaScores(sections: SectionScore[]): AreaScore[] {
  return sections.flatMap(s => s.areas);
}
