/**
 * Assessment lifecycle
 * DRAFT → IN_PROGRESS (first response) → COMPLETED (scored, report frozen)
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { CatalogReader } from './catalog';
import {
  AssessmentCompletedError,
  AssessmentNotFoundError,
  IncompleteAssessmentError,
  NotScoreableError,
  parseOrThrow,
} from './errors';
import { assessmentStatusSchema, reportResultSchema } from './records';
import { selectRecommendations } from './recommendations';
import { assemble, toAssessmentScores } from './report';
import { collectResponses, submitResponsesSchema } from './responses';
import { computeScores } from './scoring';
import type { AssessmentStore } from './store';
import { roundTo } from './utils';
import type {
  Assessment,
  AssessmentProgress,
  ReportResult,
  Response,
  SectionProgress,
} from './types';

export const DEFAULT_COMPLETION_THRESHOLD = 80;
export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 100;

const PROHIBITED_NAME_CHARS = /[<>&"']/;

const optionalText = (max: number) => z.string().trim().max(max).optional();

export const createAssessmentSchema = z.object({
  team_name: z
    .string()
    .trim()
    .min(1, 'Team name is required')
    .max(100)
    .refine(v => !PROHIBITED_NAME_CHARS.test(v), 'Team name contains prohibited characters'),
  organization_name: optionalText(100),
  first_name: optionalText(100),
  last_name: optionalText(100),
  email: z.string().trim().email().optional(),
  industry: optionalText(100),
  assessor_name: optionalText(100),
});

export type CreateAssessmentInput = z.infer<typeof createAssessmentSchema>;

const percentageOf = (answered: number, total: number): number =>
  total > 0 ? roundTo((answered / total) * 100, 1) : 0;

async function requireAssessment(store: AssessmentStore, assessmentId: string): Promise<Assessment> {
  const assessment = await store.getAssessment(assessmentId);
  if (!assessment) {
    throw new AssessmentNotFoundError(assessmentId);
  }
  return assessment;
}

// ============================================================
// Create / list
// ============================================================

export async function createAssessment(
  store: AssessmentStore,
  input: unknown,
  now: Date = new Date(),
): Promise<Assessment> {
  const data = parseOrThrow(createAssessmentSchema, input, 'Invalid assessment');
  const timestamp = now.toISOString();
  const assessment: Assessment = {
    assessment_id: uuidv4(),
    ...data,
    status: 'DRAFT',
    created_at: timestamp,
    updated_at: timestamp,
    completion_date: null,
    overall_score: null,
    foundational_score: null,
    transformation_score: null,
    enterprise_score: null,
    governance_score: null,
    deviq_classification: null,
    results_json: null,
  };
  const created = await store.createAssessment(assessment);
  console.info(`Created assessment ${created.assessment_id}`);
  return created;
}

export const listQuerySchema = z.object({
  status: assessmentStatusSchema.optional(),
  limit: z.coerce.number().int().default(DEFAULT_PAGE_SIZE),
  offset: z.coerce.number().int().default(0),
});

export interface AssessmentList {
  assessments: Assessment[];
  pagination: {
    total: number;
    limit: number;
    offset: number;
    has_next: boolean;
    has_prev: boolean;
  };
}

/**
 * Newest first; limit is capped at 100 and a negative offset reads as 0
 */
export async function listAssessments(store: AssessmentStore, query: unknown = {}): Promise<AssessmentList> {
  const parsed = parseOrThrow(listQuerySchema, query, 'Invalid list query');
  const limit = Math.min(Math.max(parsed.limit, 1), MAX_PAGE_SIZE);
  const offset = Math.max(parsed.offset, 0);

  const page = await store.listAssessments({ status: parsed.status, limit, offset });
  return {
    assessments: page.items,
    pagination: {
      total: page.total,
      limit,
      offset,
      has_next: offset + limit < page.total,
      has_prev: offset > 0,
    },
  };
}

// ============================================================
// Responses / progress
// ============================================================

/**
 * Answered counts against active questions only
 */
export function getProgress(
  catalog: CatalogReader,
  assessment: Pick<Assessment, 'assessment_id' | 'status'>,
  responses: Response[],
): AssessmentProgress {
  const answeredIds = new Set(responses.map(r => r.question_id));

  let nextQuestionId: string | null = null;
  const sections: SectionProgress[] = catalog.listSections().map(section => {
    let answered = 0;
    let total = 0;
    for (const area of catalog.listAreas(section.section_id)) {
      for (const question of catalog.listQuestions(area.area_id)) {
        total++;
        if (answeredIds.has(question.question_id)) {
          answered++;
        } else if (nextQuestionId == null) {
          nextQuestionId = question.question_id;
        }
      }
    }
    return {
      section_id: section.section_id,
      section_name: section.section_name,
      answered,
      total_questions: total,
      percentage: percentageOf(answered, total),
    };
  });

  const answeredQuestions = sections.reduce((sum, s) => sum + s.answered, 0);
  const totalQuestions = catalog.countActiveQuestions();
  const lastResponseAt = responses.reduce<string | null>(
    (latest, r) => (latest == null || r.timestamp > latest ? r.timestamp : latest),
    null,
  );

  return {
    assessment_id: assessment.assessment_id,
    status: assessment.status,
    total_questions: totalQuestions,
    answered_questions: answeredQuestions,
    percentage: percentageOf(answeredQuestions, totalQuestions),
    is_complete: totalQuestions > 0 && answeredQuestions >= totalQuestions,
    sections,
    next_question_id: nextQuestionId,
    last_response_at: lastResponseAt,
  };
}

export async function getAssessmentWithProgress(
  store: AssessmentStore,
  catalog: CatalogReader,
  assessmentId: string,
): Promise<{ assessment: Assessment; progress: AssessmentProgress }> {
  const assessment = await requireAssessment(store, assessmentId);
  const responses = await store.getResponses(assessmentId);
  return { assessment, progress: getProgress(catalog, assessment, responses) };
}

export async function getResponses(store: AssessmentStore, assessmentId: string): Promise<Response[]> {
  await requireAssessment(store, assessmentId);
  return store.getResponses(assessmentId);
}

/**
 * Validates and upserts answers; the first save moves DRAFT to IN_PROGRESS.
 * The store applies the status change and the per-question upsert against
 * its latest state, so a concurrent save or completion is never overwritten.
 */
export async function submitResponses(
  store: AssessmentStore,
  catalog: CatalogReader,
  assessmentId: string,
  body: unknown,
  now: Date = new Date(),
): Promise<{ saved_count: number; progress: AssessmentProgress }> {
  const { responses: inputs } = parseOrThrow(submitResponsesSchema, body, 'Invalid responses');
  const assessment = await requireAssessment(store, assessmentId);
  if (assessment.status === 'COMPLETED') {
    throw new AssessmentCompletedError(assessmentId);
  }

  const incoming = collectResponses(catalog, assessmentId, inputs, now);
  const updated = await store.markInProgress(assessmentId, now.toISOString());
  const merged = await store.upsertResponses(assessmentId, incoming);

  return { saved_count: incoming.length, progress: getProgress(catalog, updated, merged) };
}

// ============================================================
// Completion / report
// ============================================================

export interface CompleteOptions {
  force?: boolean;
  threshold?: number;
  now?: Date;
}

function buildReport(
  catalog: CatalogReader,
  assessment: Assessment,
  responses: Response[],
  generatedAt: string,
): ReportResult {
  const scores = computeScores(responses, catalog);
  const recommendations = selectRecommendations(scores, catalog);
  return assemble(scores, recommendations, { ...assessment, generated_at: generatedAt }, catalog);
}

/**
 * Scores the full response set and freezes the report on the record
 */
export async function completeAssessment(
  store: AssessmentStore,
  catalog: CatalogReader,
  assessmentId: string,
  options: CompleteOptions = {},
): Promise<{ assessment: Assessment; report: ReportResult }> {
  const { force = false, threshold = DEFAULT_COMPLETION_THRESHOLD, now = new Date() } = options;

  const assessment = await requireAssessment(store, assessmentId);
  if (assessment.status === 'COMPLETED') {
    throw new AssessmentCompletedError(assessmentId);
  }

  const responses = await store.getResponses(assessmentId);
  const progress = getProgress(catalog, assessment, responses);
  if (!force && progress.percentage < threshold) {
    throw new IncompleteAssessmentError(progress.percentage, threshold);
  }

  const timestamp = now.toISOString();
  const report = buildReport(catalog, assessment, responses, timestamp);
  if (report.status === 'not_scoreable') {
    throw new NotScoreableError(assessmentId, report.not_scoreable_reason ?? 'no usable responses');
  }

  const completed: Assessment = {
    ...assessment,
    ...toAssessmentScores(report),
    status: 'COMPLETED',
    completion_date: timestamp,
    updated_at: timestamp,
    results_json: JSON.stringify(report),
  };
  await store.saveAssessment(completed);
  console.info(
    `Completed assessment ${assessmentId}: ${report.overall_score} (${report.classification?.label ?? '-'})`,
  );
  return { assessment: completed, report };
}

function parseStoredReport(assessment: Assessment): ReportResult | null {
  if (!assessment.results_json) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(assessment.results_json);
  } catch (error) {
    console.warn(`Stored report of ${assessment.assessment_id} is unreadable, rebuilding`, error);
    return null;
  }
  const parsed = reportResultSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(
      `Stored report of ${assessment.assessment_id} does not match the report shape, rebuilding:`,
      parsed.error.issues.slice(0, 3).map(i => `${i.path.join('.')}: ${i.message}`),
    );
    return null;
  }
  return parsed.data;
}

/**
 * Frozen report of a completed assessment, otherwise a live preview
 */
export async function getReport(
  store: AssessmentStore,
  catalog: CatalogReader,
  assessmentId: string,
  now: Date = new Date(),
): Promise<{ report: ReportResult; frozen: boolean }> {
  const assessment = await requireAssessment(store, assessmentId);
  if (assessment.status === 'COMPLETED') {
    const stored = parseStoredReport(assessment);
    if (stored) return { report: stored, frozen: true };
  }
  const responses = await store.getResponses(assessmentId);
  return { report: buildReport(catalog, assessment, responses, now.toISOString()), frozen: false };
}
