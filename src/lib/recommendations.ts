/**
 * Next-step recommendations
 * - current level = floor(area score), target = current + 1
 * - weakest areas first, ties in display order (section order, then area order)
 * - unanswered areas of a scored section come last as not_scoreable entries
 */

import type { CatalogReader } from './catalog';
import { SCORE_MAX, SCORE_MIN } from './maturity';
import { clamp, normalizeLabel, roundTo, splitPipeList } from './utils';
import type {
  ActionItemGroup,
  AreaTimelines,
  NextStepRecommendation,
  NotScoreableRecommendation,
  ProgressionGuidance,
  ProgressionRule,
  Recommendation,
  RecommendationPriority,
  RecommendationSummary,
  Score,
  ScoreOutcome,
  TargetLevel,
} from './types';

export { splitPipeList };

export interface RecommendationOptions {
  /** Caps the number of next_step entries */
  limit?: number;
}

type ImprovableLevel = Exclude<Score, 4>;

const NEXT_LEVEL: Record<ImprovableLevel, TargetLevel> = { 1: 2, 2: 3, 3: 4 };

const TIMELINE_KEY: Record<ImprovableLevel, keyof AreaTimelines> = {
  1: '1_to_2',
  2: '2_to_3',
  3: '3_to_4',
};

const PRIORITY: Record<ImprovableLevel, RecommendationPriority> = {
  1: 'high',
  2: 'medium',
  3: 'low',
};

/**
 * floor(score) clipped to 1-4; 2.5 → 2, 3.99 → 3, 4.0 → 4
 */
export function currentLevelOf(score: number): Score {
  const level = Math.floor(roundTo(clamp(score, SCORE_MIN, SCORE_MAX), 2));
  if (level <= 1) return 1;
  if (level === 2) return 2;
  if (level === 3) return 3;
  return 4;
}

/**
 * "Category: a, b|Other: c" → [{ category, items }]; a part without ":" is a single item
 */
export function parseActionItems(text: string | null | undefined): ActionItemGroup[] {
  return splitPipeList(text).map(part => {
    const colon = part.indexOf(':');
    if (colon === -1) {
      return { category: null, items: [part] };
    }
    return {
      category: normalizeLabel(part.slice(0, colon)),
      items: part
        .slice(colon + 1)
        .split(',')
        .map(item => normalizeLabel(item))
        .filter(item => item.length > 0),
    };
  });
}

export function formatGuidance(rule: ProgressionRule): ProgressionGuidance {
  return {
    prerequisites: splitPipeList(rule.prerequisites),
    action_items: parseActionItems(rule.action_items),
    success_metrics: splitPipeList(rule.success_metrics),
    timeline: normalizeLabel(rule.timeline),
    common_pitfall: normalizeLabel(rule.common_pitfall),
  };
}

interface RankedCandidate {
  score: number;
  entry: Omit<NextStepRecommendation, 'rank'>;
}

/**
 * Builds the prioritized roadmap from a score result
 */
export function selectRecommendations(
  scoreResult: ScoreOutcome,
  catalog: CatalogReader,
  options: RecommendationOptions = {},
): Recommendation[] {
  const candidates: RankedCandidate[] = [];
  const unscored: NotScoreableRecommendation[] = [];

  for (const section of scoreResult.sections) {
    if (section.mean == null) continue;

    for (const areaScore of section.areas) {
      if (areaScore.mean == null) {
        unscored.push({
          kind: 'not_scoreable',
          area_id: areaScore.area_id,
          area_name: areaScore.area_name,
          section_id: section.section_id,
          section_name: section.section_name,
          reason: 'No answered questions in this area',
        });
        continue;
      }

      const score = roundTo(areaScore.mean, 2);
      const level = currentLevelOf(score);
      if (level === 4) continue;

      const target = NEXT_LEVEL[level];
      const rule = catalog.getProgressionRule(areaScore.area_id, target);
      if (!rule) {
        console.warn(`No progression rule for ${areaScore.area_id} level ${target}`);
      }
      const area = catalog.getArea(areaScore.area_id);
      const estimated = area ? normalizeLabel(area.timelines[TIMELINE_KEY[level]]) : '';

      candidates.push({
        score,
        entry: {
          kind: 'next_step',
          area_id: areaScore.area_id,
          area_name: areaScore.area_name,
          section_id: section.section_id,
          section_name: section.section_name,
          area_score: score,
          current_level: level,
          target_level: target,
          score_gap: roundTo(target - score, 2),
          priority: PRIORITY[level],
          estimated_timeline: estimated || (rule ? normalizeLabel(rule.timeline) : ''),
          guidance: rule ? formatGuidance(rule) : null,
        },
      });
    }
  }

  // Array.prototype.sort is stable, so equal scores keep display order
  candidates.sort((a, b) => a.score - b.score);

  const limit = options.limit != null && options.limit >= 0 ? options.limit : candidates.length;
  const ranked: NextStepRecommendation[] = candidates
    .slice(0, limit)
    .map((c, i) => ({ ...c.entry, rank: i + 1 }));

  return [...ranked, ...unscored];
}

/**
 * Counts next steps by priority, plus the areas that could not be scored
 */
export function summarizeRecommendations(recommendations: Recommendation[]): RecommendationSummary {
  const summary: RecommendationSummary = {
    total_count: 0,
    by_priority: { high: 0, medium: 0, low: 0 },
    not_scoreable_count: 0,
  };
  for (const rec of recommendations) {
    if (rec.kind === 'not_scoreable') {
      summary.not_scoreable_count++;
    } else {
      summary.total_count++;
      summary.by_priority[rec.priority]++;
    }
  }
  return summary;
}

export interface SectionRecommendations {
  section_id: string;
  section_name: string;
  recommendations: Recommendation[];
}

/**
 * Groups recommendations by section in section order; empty sections are left out
 */
export function groupBySection(
  recommendations: Recommendation[],
  catalog: CatalogReader,
): SectionRecommendations[] {
  return catalog
    .listSections()
    .map(section => ({
      section_id: section.section_id,
      section_name: section.section_name,
      recommendations: recommendations.filter(r => r.section_id === section.section_id),
    }))
    .filter(group => group.recommendations.length > 0);
}
