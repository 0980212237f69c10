import path from 'path';
import { buildCatalog, loadCatalogLocal, type CatalogReader } from '@/lib/catalog';
import type { CatalogData, ProgressionRule, Question, Response, Score, TargetLevel } from '@/lib/types';

export const CATALOG_PATH = path.join(process.cwd(), 'data', 'catalog.json');

export const loadShippedCatalog = (): Promise<CatalogReader> => loadCatalogLocal(CATALOG_PATH);

export const TEST_ASSESSMENT_ID = 'test-assessment';

export function answer(questionId: string, score: Score, timestamp = '2026-01-01T00:00:00.000Z'): Response {
  return {
    response_id: `r-${questionId}-${timestamp}`,
    assessment_id: TEST_ASSESSMENT_ID,
    question_id: questionId,
    score,
    timestamp,
  };
}

/**
 * One answer per active question of the catalog, all with the same score
 */
export function answerAll(catalog: CatalogReader, score: Score): Response[] {
  return catalog
    .listSections()
    .flatMap(s => catalog.listAreas(s.section_id))
    .flatMap(a => catalog.listQuestions(a.area_id))
    .map(q => answer(q.question_id, score));
}

const LEVELS: [string, string, string, string] = ['Level 1', 'Level 2', 'Level 3', 'Level 4'];
const TIMELINES = { '1_to_2': '1-2 weeks', '2_to_3': '3-4 weeks', '3_to_4': '5-6 weeks' };

function question(questionId: string, areaId: string, order: number, active = true): Question {
  return { question_id: questionId, area_id: areaId, text: `Question ${questionId}`, levels: LEVELS, order, active };
}

function rule(areaId: string, level: TargetLevel): ProgressionRule {
  return {
    area_id: areaId,
    target_level: level,
    prerequisites: `Pre ${areaId}-${level}a|Pre ${areaId}-${level}b`,
    action_items: `Setup: first ${areaId}, second ${areaId}|Plain step ${level}`,
    success_metrics: `Metric ${level}`,
    timeline: `${level} weeks`,
    common_pitfall: `Pitfall ${level}`,
  };
}

/**
 * Two sections (listed out of order on purpose):
 *   S1 "First":  A1 (A1-01, A1-02, inactive A1-03), A2 (A2-01)
 *   S2 "Second": B1 (B1-01)
 * A2 has no level 4 rule.
 */
export function smallCatalogData(): CatalogData {
  return {
    version: 'test',
    updated_at: '2026-01-01T00:00:00.000Z',
    sections: [
      { section_id: 'S2', section_name: 'Second', description: 'Second section', order: 2, record_field: 'transformation_score',
        benchmark: { industry_average: 1.9, top_quartile: 2.6, best_in_class: 3.3 } },
      { section_id: 'S1', section_name: 'First', description: 'First section', order: 1, record_field: 'foundational_score',
        benchmark: { industry_average: 2.1, top_quartile: 2.8, best_in_class: 3.5 } },
    ],
    areas: [
      { area_id: 'A2', section_id: 'S1', area_name: 'Area Two', description: '', order: 2, timelines: TIMELINES },
      { area_id: 'A1', section_id: 'S1', area_name: 'Area One', description: '', order: 1, timelines: TIMELINES },
      { area_id: 'B1', section_id: 'S2', area_name: 'Area B', description: '', order: 1, timelines: TIMELINES },
    ],
    questions: [
      question('A1-02', 'A1', 2),
      question('A1-01', 'A1', 1),
      question('A1-03', 'A1', 3, false),
      question('A2-01', 'A2', 1),
      question('B1-01', 'B1', 1),
    ],
    progressions: [
      rule('A1', 2), rule('A1', 3), rule('A1', 4),
      rule('A2', 2), rule('A2', 3),
      rule('B1', 2), rule('B1', 3), rule('B1', 4),
    ],
  };
}

export const smallCatalog = (): CatalogReader => buildCatalog(smallCatalogData());
