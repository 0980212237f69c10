/**
 * Report assembly
 * - shapes score / recommendation output into the persisted ReportResult
 * - strengths / weaknesses (top and bottom 3 areas)
 * - section spread (variance + consistency label)
 * - section benchmarks, recommendation summary, improvement roadmap
 */

import { DEFAULT_BENCHMARK, type CatalogReader } from './catalog';
import { computeImprovementPotential, getTierDetails } from './maturity';
import { summarizeRecommendations } from './recommendations';
import { flattenAreaScores, SCORING_VERSION } from './scoring';
import { roundTo } from './utils';
import type {
  AreaHighlight,
  AreaScore,
  AssessmentMetadata,
  AssessmentScores,
  BenchmarkPosition,
  ImprovementPotential,
  ImprovementRoadmap,
  MaturityClassification,
  NextStepRecommendation,
  Recommendation,
  ReportResult,
  ReportSection,
  ScoreOutcome,
  SectionBenchmark,
  SectionScore,
  SectionSpread,
} from './types';

export interface ReportContext extends AssessmentMetadata {
  assessment_id: string;
  assessment_name?: string;
  generated_at?: string;
}

const HIGHLIGHT_COUNT = 3;
const IMMEDIATE_ACTION_COUNT = 5;

type ScoredArea = AreaScore & { mean: number };

const hasMean = (a: AreaScore): a is ScoredArea => a.mean != null;

/**
 * Strengths (top N areas); ties keep display order
 */
export function getStrengths(areas: AreaScore[], topN: number = HIGHLIGHT_COUNT): AreaHighlight[] {
  const sorted = areas.filter(hasMean).sort((a, b) => b.mean - a.mean);
  return toHighlights(sorted.slice(0, topN));
}

/**
 * Weaknesses (bottom N areas); ties keep display order
 */
export function getWeaknesses(areas: AreaScore[], bottomN: number = HIGHLIGHT_COUNT): AreaHighlight[] {
  const sorted = areas.filter(hasMean).sort((a, b) => a.mean - b.mean);
  return toHighlights(sorted.slice(0, bottomN));
}

function toHighlights(areas: ScoredArea[]): AreaHighlight[] {
  return areas.map((a, i) => ({
    area_id: a.area_id,
    area_name: a.area_name,
    section_id: a.section_id,
    mean: roundTo(a.mean, 2),
    rank: i + 1,
  }));
}

/**
 * Population variance of the scored section means
 */
export function computeSectionSpread(sections: SectionScore[]): SectionSpread | null {
  const scored = sections.filter((s): s is SectionScore & { mean: number } => s.mean != null);
  if (scored.length === 0) return null;

  const mean = scored.reduce((sum, s) => sum + s.mean, 0) / scored.length;
  const variance = scored.reduce((sum, s) => sum + (s.mean - mean) ** 2, 0) / scored.length;

  let strongest = scored[0];
  let weakest = scored[0];
  for (const s of scored) {
    if (s.mean > strongest.mean) strongest = s;
    if (s.mean < weakest.mean) weakest = s;
  }

  let consistency: SectionSpread['consistency'];
  if (variance < 0.5) consistency = 'Excellent';
  else if (variance < 1.0) consistency = 'Good';
  else if (variance < 1.5) consistency = 'Fair';
  else consistency = 'Needs Attention';

  return {
    variance: roundTo(variance, 2),
    consistency,
    strongest_section_id: strongest.section_id,
    weakest_section_id: weakest.section_id,
  };
}

export function getBenchmarkPosition(score: number | null, benchmark: SectionBenchmark): BenchmarkPosition | null {
  if (score == null) return null;
  if (score >= benchmark.best_in_class) return 'best_in_class';
  if (score >= benchmark.top_quartile) return 'top_quartile';
  if (score >= benchmark.industry_average) return 'above_average';
  return 'below_average';
}

/**
 * High-priority steps first, then the next tier to aim for
 */
export function buildRoadmap(
  overallScore: number,
  classification: MaturityClassification,
  improvement: ImprovementPotential,
  completionPercentage: number,
  recommendations: Recommendation[],
): ImprovementRoadmap {
  const immediate = recommendations
    .filter((r): r is NextStepRecommendation => r.kind === 'next_step' && r.priority === 'high')
    .slice(0, IMMEDIATE_ACTION_COUNT);

  return {
    current_state: {
      overall_score: overallScore,
      maturity_level: classification.label,
      completion_percentage: completionPercentage,
    },
    immediate_actions: {
      description: 'High-priority recommendations to implement first',
      estimated_duration: '2-4 weeks',
      recommendations: immediate,
    },
    target_state:
      improvement.next_tier && improvement.next_tier_label && improvement.next_tier_min_score != null
        ? {
            tier: improvement.next_tier,
            label: improvement.next_tier_label,
            target_score: improvement.next_tier_min_score,
            estimated_timeline: '6-12 months',
          }
        : null,
  };
}

const displayName = (context: ReportContext): string =>
  context.assessment_name || context.team_name || context.organization_name || 'Assessment';

function pickMetadata(context: ReportContext): AssessmentMetadata {
  const { team_name, organization_name, first_name, last_name, email, industry, assessor_name } = context;
  return { team_name, organization_name, first_name, last_name, email, industry, assessor_name };
}

function buildSections(
  sections: SectionScore[],
  recommendations: Recommendation[],
  catalog?: CatalogReader,
): ReportSection[] {
  return sections.map(s => {
    const section = catalog?.getSection(s.section_id);
    const score = s.mean == null ? null : roundTo(s.mean, 2);
    const benchmark = section?.benchmark ?? DEFAULT_BENCHMARK;
    return {
      section_id: s.section_id,
      section_name: s.section_name,
      description: section?.description ?? '',
      record_field: s.record_field,
      score,
      coverage: roundTo(s.coverage, 4),
      benchmark,
      benchmark_position: getBenchmarkPosition(score, benchmark),
      areas: s.areas.map(a => ({
        area_id: a.area_id,
        area_name: a.area_name,
        score: a.mean == null ? null : roundTo(a.mean, 2),
        answered: a.answered,
        total_questions: a.total_questions,
      })),
      recommendations: recommendations.filter(r => r.section_id === s.section_id),
    };
  });
}

function buildReport(
  scoreResult: ScoreOutcome,
  recommendations: Recommendation[],
  context: ReportContext,
  catalog?: CatalogReader,
): ReportResult {
  const generatedAt = context.generated_at ?? new Date().toISOString();
  const total = scoreResult.total_questions;
  const completion = {
    answered: scoreResult.answered,
    total_questions: total,
    percentage: total > 0 ? roundTo((scoreResult.answered / total) * 100, 1) : 0,
  };
  const base = {
    assessment_id: context.assessment_id,
    assessment_name: displayName(context),
    metadata: pickMetadata(context),
    sections: buildSections(scoreResult.sections, recommendations, catalog),
    completion,
    excluded: scoreResult.excluded,
    generated_at: generatedAt,
    scoring_version: SCORING_VERSION,
  };

  if (scoreResult.kind === 'not_scoreable') {
    return {
      ...base,
      status: 'not_scoreable',
      not_scoreable_reason: scoreResult.reason,
      overall_score: null,
      classification: null,
      tier_details: null,
      improvement_potential: null,
      recommendations: [],
      summary: summarizeRecommendations([]),
      roadmap: null,
      strengths: [],
      weaknesses: [],
      section_spread: null,
    };
  }

  const areas = flattenAreaScores(scoreResult.sections);
  const improvement = computeImprovementPotential(scoreResult.overall_score);
  return {
    ...base,
    status: 'scored',
    overall_score: scoreResult.overall_score,
    classification: scoreResult.classification,
    tier_details: getTierDetails(scoreResult.classification.tier),
    improvement_potential: improvement,
    recommendations,
    summary: summarizeRecommendations(recommendations),
    roadmap: buildRoadmap(
      scoreResult.overall_score,
      scoreResult.classification,
      improvement,
      completion.percentage,
      recommendations,
    ),
    strengths: getStrengths(areas),
    weaknesses: getWeaknesses(areas),
    section_spread: computeSectionSpread(scoreResult.sections),
  };
}

/**
 * Builds the report. Does not recompute scores, and never throws:
 * anything it cannot shape comes back as the not_scoreable variant.
 */
export function assemble(
  scoreResult: ScoreOutcome,
  recommendations: Recommendation[],
  context: ReportContext,
  catalog?: CatalogReader,
): ReportResult {
  try {
    return buildReport(scoreResult, recommendations, context, catalog);
  } catch (error) {
    // context itself may be what failed
    const assessmentId = context?.assessment_id ?? '';
    console.error(`Error assembling report for ${assessmentId}:`, error);
    return {
      assessment_id: assessmentId,
      assessment_name: context?.assessment_name ?? 'Assessment',
      metadata: {},
      status: 'not_scoreable',
      not_scoreable_reason: 'Report could not be assembled',
      overall_score: null,
      classification: null,
      tier_details: null,
      improvement_potential: null,
      sections: [],
      recommendations: [],
      summary: summarizeRecommendations([]),
      roadmap: null,
      strengths: [],
      weaknesses: [],
      section_spread: null,
      completion: { answered: 0, total_questions: 0, percentage: 0 },
      excluded: [],
      generated_at: context?.generated_at ?? new Date().toISOString(),
      scoring_version: SCORING_VERSION,
    };
  }
}

/**
 * Assessment record columns derived from a report
 */
export function toAssessmentScores(report: ReportResult): AssessmentScores {
  const scoreOf = (field: ReportSection['record_field']): number | null =>
    report.sections.find(s => s.record_field === field)?.score ?? null;

  return {
    overall_score: report.overall_score,
    foundational_score: scoreOf('foundational_score'),
    transformation_score: scoreOf('transformation_score'),
    enterprise_score: scoreOf('enterprise_score'),
    governance_score: scoreOf('governance_score'),
    deviq_classification: report.classification?.label ?? null,
  };
}
