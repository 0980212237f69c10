/**
 * Reference catalog
 * - sections → areas → questions, plus progression rules per area and target level
 * - loaded once from JSON, held in memory, never mutated
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { CatalogError } from './errors';
import { PATHS } from './paths';
import type {
  Area,
  CatalogData,
  ProgressionRule,
  Question,
  Section,
  SectionBenchmark,
  TargetLevel,
} from './types';

// ============================================================
// File schema
// ============================================================

export const DEFAULT_BENCHMARK: SectionBenchmark = {
  industry_average: 2.0,
  top_quartile: 2.5,
  best_in_class: 3.2,
};

const benchmarkSchema = z.object({
  industry_average: z.number().min(1).max(4),
  top_quartile: z.number().min(1).max(4),
  best_in_class: z.number().min(1).max(4),
});

const sectionSchema = z.object({
  section_id: z.string().min(1),
  section_name: z.string().min(1),
  description: z.string().default(''),
  order: z.number().int(),
  record_field: z.enum([
    'foundational_score',
    'transformation_score',
    'enterprise_score',
    'governance_score',
  ]),
  benchmark: benchmarkSchema.default(DEFAULT_BENCHMARK),
});

const areaSchema = z.object({
  area_id: z.string().min(1),
  section_id: z.string().min(1),
  area_name: z.string().min(1),
  description: z.string().default(''),
  order: z.number().int(),
  timelines: z.object({
    '1_to_2': z.string(),
    '2_to_3': z.string(),
    '3_to_4': z.string(),
  }),
});

const questionSchema = z.object({
  question_id: z.string().min(1),
  area_id: z.string().min(1),
  text: z.string().min(1),
  levels: z.tuple([z.string(), z.string(), z.string(), z.string()]),
  order: z.number().int(),
  active: z.boolean().default(true),
});

const progressionSchema = z.object({
  area_id: z.string().min(1),
  target_level: z.union([z.literal(2), z.literal(3), z.literal(4)]),
  prerequisites: z.string().default(''),
  action_items: z.string().default(''),
  success_metrics: z.string().default(''),
  timeline: z.string().default(''),
  common_pitfall: z.string().default(''),
});

const catalogSchema = z.object({
  version: z.string().default('1.0'),
  sections: z.array(sectionSchema),
  areas: z.array(areaSchema),
  questions: z.array(questionSchema),
  progressions: z.array(progressionSchema),
  updated_at: z.string().default(''),
});

/**
 * Validates raw catalog JSON
 */
export function parseCatalogData(raw: unknown): CatalogData {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new CatalogError(`Invalid catalog data: ${issues.slice(0, 5).join('; ')}`);
  }
  return parsed.data;
}

// ============================================================
// Read interface
// ============================================================

export interface CatalogReader {
  listSections(): readonly Section[];
  listAreas(sectionId: string): readonly Area[];
  listQuestions(areaId: string, activeOnly?: boolean): readonly Question[];
  listProgressionRules(areaId: string): readonly ProgressionRule[];
  getSection(sectionId: string): Section | undefined;
  getArea(areaId: string): Area | undefined;
  getQuestion(questionId: string): Question | undefined;
  getProgressionRule(areaId: string, targetLevel: TargetLevel): ProgressionRule | undefined;
  countActiveQuestions(): number;
}

const byOrder = <T extends { order: number }>(idOf: (item: T) => string) =>
  (a: T, b: T) => a.order - b.order || idOf(a).localeCompare(idOf(b));

const ruleKey = (areaId: string, level: number) => `${areaId}::${level}`;

function indexUnique<T>(items: T[], idOf: (item: T) => string, kind: string): Map<string, T> {
  const map = new Map<string, T>();
  for (const item of items) {
    const id = idOf(item);
    if (map.has(id)) {
      throw new CatalogError(`Duplicate ${kind} id: ${id}`);
    }
    map.set(id, item);
  }
  return map;
}

function groupBy<T>(items: T[], keyOf: (item: T) => string): Map<string, T[]> {
  const map = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const list = map.get(key);
    if (list) {
      list.push(item);
    } else {
      map.set(key, [item]);
    }
  }
  return map;
}

class Catalog implements CatalogReader {
  private readonly sections: readonly Section[];
  private readonly sectionById: Map<string, Section>;
  private readonly areaById: Map<string, Area>;
  private readonly questionById: Map<string, Question>;
  private readonly areasBySection: Map<string, Area[]>;
  private readonly questionsByArea: Map<string, Question[]>;
  private readonly rulesByArea: Map<string, ProgressionRule[]>;
  private readonly ruleByKey: Map<string, ProgressionRule>;
  private readonly activeQuestionCount: number;

  constructor(data: CatalogData) {
    this.sectionById = indexUnique(data.sections, s => s.section_id, 'section');
    this.areaById = indexUnique(data.areas, a => a.area_id, 'area');
    this.questionById = indexUnique(data.questions, q => q.question_id, 'question');

    for (const area of data.areas) {
      if (!this.sectionById.has(area.section_id)) {
        throw new CatalogError(`Area ${area.area_id} references unknown section ${area.section_id}`);
      }
    }
    for (const question of data.questions) {
      if (!this.areaById.has(question.area_id)) {
        throw new CatalogError(`Question ${question.question_id} references unknown area ${question.area_id}`);
      }
    }

    this.ruleByKey = new Map();
    for (const rule of data.progressions) {
      if (!this.areaById.has(rule.area_id)) {
        throw new CatalogError(`Progression rule references unknown area ${rule.area_id}`);
      }
      const key = ruleKey(rule.area_id, rule.target_level);
      if (this.ruleByKey.has(key)) {
        throw new CatalogError(`Duplicate progression rule for ${rule.area_id} level ${rule.target_level}`);
      }
      this.ruleByKey.set(key, rule);
    }

    this.sections = [...data.sections].sort(byOrder(s => s.section_id));

    this.areasBySection = groupBy(data.areas, a => a.section_id);
    this.areasBySection.forEach(list => list.sort(byOrder(a => a.area_id)));

    this.questionsByArea = groupBy(data.questions, q => q.area_id);
    this.questionsByArea.forEach(list => list.sort(byOrder(q => q.question_id)));

    this.rulesByArea = groupBy(data.progressions, r => r.area_id);
    this.rulesByArea.forEach(list => list.sort((a, b) => a.target_level - b.target_level));

    this.activeQuestionCount = data.questions.filter(q => q.active).length;
  }

  listSections(): readonly Section[] {
    return this.sections;
  }

  listAreas(sectionId: string): readonly Area[] {
    return this.areasBySection.get(sectionId) ?? [];
  }

  listQuestions(areaId: string, activeOnly: boolean = true): readonly Question[] {
    const questions = this.questionsByArea.get(areaId) ?? [];
    return activeOnly ? questions.filter(q => q.active) : questions;
  }

  listProgressionRules(areaId: string): readonly ProgressionRule[] {
    return this.rulesByArea.get(areaId) ?? [];
  }

  getSection(sectionId: string): Section | undefined {
    return this.sectionById.get(sectionId);
  }

  getArea(areaId: string): Area | undefined {
    return this.areaById.get(areaId);
  }

  getQuestion(questionId: string): Question | undefined {
    return this.questionById.get(questionId);
  }

  getProgressionRule(areaId: string, targetLevel: TargetLevel): ProgressionRule | undefined {
    return this.ruleByKey.get(ruleKey(areaId, targetLevel));
  }

  countActiveQuestions(): number {
    return this.activeQuestionCount;
  }
}

/**
 * Builds the in-memory catalog (id indexes + parent → children lists)
 */
export function buildCatalog(data: CatalogData): CatalogReader {
  return new Catalog(data);
}

/**
 * Reads and builds the catalog from the local JSON file
 */
export async function loadCatalogLocal(filePath?: string): Promise<CatalogReader> {
  const catalogPath = filePath ?? path.join(process.cwd(), PATHS.CATALOG_FILE);
  let raw: unknown;
  try {
    const content = await fs.readFile(catalogPath, 'utf-8');
    raw = JSON.parse(content);
  } catch (error) {
    console.error(`Error reading catalog ${catalogPath}:`, error);
    throw new CatalogError(`Catalog could not be read from ${catalogPath}`);
  }
  return buildCatalog(parseCatalogData(raw));
}

const catalogCache = new Map<string, Promise<CatalogReader>>();

/**
 * Loads the catalog once per file path; later calls share the same reader.
 * A failed load is not cached.
 */
export function getCatalog(filePath?: string): Promise<CatalogReader> {
  const key = filePath ?? path.join(process.cwd(), PATHS.CATALOG_FILE);
  const cached = catalogCache.get(key);
  if (cached) return cached;

  const pending = loadCatalogLocal(key).catch((error: unknown) => {
    catalogCache.delete(key);
    throw error;
  });
  catalogCache.set(key, pending);
  return pending;
}

export function resetCatalogCache(): void {
  catalogCache.clear();
}

export interface CatalogTree {
  sections: Array<Section & {
    areas: Array<Area & { questions: Question[] }>;
  }>;
  total_questions: number;
}

/**
 * Nested sections → areas → active questions, for the questionnaire UI
 */
export function toCatalogTree(catalog: CatalogReader): CatalogTree {
  return {
    sections: catalog.listSections().map(section => ({
      ...section,
      areas: catalog.listAreas(section.section_id).map(area => ({
        ...area,
        questions: [...catalog.listQuestions(area.area_id)],
      })),
    })),
    total_questions: catalog.countActiveQuestions(),
  };
}
