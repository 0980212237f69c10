// Response score (1-4)
export type Score = 1 | 2 | 3 | 4;

// Level 1 is the floor, so no rule targets it
export type TargetLevel = 2 | 3 | 4;

export type AssessmentStatus = 'DRAFT' | 'IN_PROGRESS' | 'COMPLETED';

export type SectionRecordField =
  | 'foundational_score'
  | 'transformation_score'
  | 'enterprise_score'
  | 'governance_score';

// ============================================================
// Reference catalog
// ============================================================

// Reference scores for comparing a section result
export interface SectionBenchmark {
  industry_average: number;
  top_quartile: number;
  best_in_class: number;
}

export interface Section {
  section_id: string;
  section_name: string;
  description: string;
  order: number;
  record_field: SectionRecordField;
  benchmark: SectionBenchmark;
}

export interface AreaTimelines {
  '1_to_2': string;
  '2_to_3': string;
  '3_to_4': string;
}

export interface Area {
  area_id: string;
  section_id: string;
  area_name: string;
  description: string;
  order: number;
  timelines: AreaTimelines;
}

export interface Question {
  question_id: string;
  area_id: string;
  text: string;
  /** Level descriptions; index 0 describes score 1. */
  levels: [string, string, string, string];
  order: number;
  active: boolean;
}

/** Pipe-separated text fields, as stored in the catalog file. */
export interface ProgressionRule {
  area_id: string;
  target_level: TargetLevel;
  prerequisites: string;
  action_items: string;
  success_metrics: string;
  timeline: string;
  common_pitfall: string;
}

// Catalog file shape
export interface CatalogData {
  version: string;
  sections: Section[];
  areas: Area[];
  questions: Question[];
  progressions: ProgressionRule[];
  updated_at: string;
}

// ============================================================
// Assessments & responses
// ============================================================

export interface Response {
  response_id: string;
  assessment_id: string;
  question_id: string;
  score: Score;
  note?: string;
  response_time_seconds?: number;
  timestamp: string;
}

export interface ResponsesData {
  responses: Response[];
  updated_at: string;
}

export interface AssessmentMetadata {
  team_name?: string;
  organization_name?: string;
  first_name?: string;
  last_name?: string;
  email?: string;
  industry?: string;
  assessor_name?: string;
}

export interface AssessmentScores {
  overall_score: number | null;
  foundational_score: number | null;
  transformation_score: number | null;
  enterprise_score: number | null;
  governance_score: number | null;
  deviq_classification: string | null;
}

export interface Assessment extends AssessmentMetadata, AssessmentScores {
  assessment_id: string;
  status: AssessmentStatus;
  created_at: string;
  updated_at: string;
  completion_date: string | null;
  results_json: string | null;
}

// Index entry (assessment listing)
export interface ManifestEntry {
  assessment_id: string;
  assessment_file_id: string;
  status: AssessmentStatus;
  team_name?: string;
  created_at: string;
  updated_at: string;
}

export interface ManifestData {
  entries: ManifestEntry[];
  updated_at: string;
}

// ============================================================
// Scoring
// ============================================================

export type MaturityTier = 'TRADITIONAL' | 'AI_ASSISTED' | 'AI_AUGMENTED' | 'AI_FIRST';

export interface MaturityClassification {
  tier: MaturityTier;
  label: string;
  level: Score;
}

export interface AreaScore {
  area_id: string;
  area_name: string;
  section_id: string;
  order: number;
  /** null when no active question of the area has an answer */
  mean: number | null;
  answered: number;
  total_questions: number;
  coverage: number;
}

export interface SectionScore {
  section_id: string;
  section_name: string;
  record_field: SectionRecordField;
  order: number;
  mean: number | null;
  areas: AreaScore[];
  answered: number;
  total_questions: number;
  coverage: number;
}

export type ExclusionReason = 'unknown_question' | 'inactive_question' | 'invalid_score';

export interface ExcludedResponse {
  question_id: string;
  reason: ExclusionReason;
}

export interface ScoreResult {
  kind: 'scored';
  overall_score: number;
  classification: MaturityClassification;
  sections: SectionScore[];
  answered: number;
  total_questions: number;
  excluded: ExcludedResponse[];
}

export interface NotScoreable {
  kind: 'not_scoreable';
  reason: string;
  sections: SectionScore[];
  answered: number;
  total_questions: number;
  excluded: ExcludedResponse[];
}

export type ScoreOutcome = ScoreResult | NotScoreable;

// ============================================================
// Recommendations
// ============================================================

export type RecommendationPriority = 'high' | 'medium' | 'low';

export interface ActionItemGroup {
  category: string | null;
  items: string[];
}

export interface ProgressionGuidance {
  prerequisites: string[];
  action_items: ActionItemGroup[];
  success_metrics: string[];
  timeline: string;
  common_pitfall: string;
}

export interface NextStepRecommendation {
  kind: 'next_step';
  rank: number;
  area_id: string;
  area_name: string;
  section_id: string;
  section_name: string;
  area_score: number;
  current_level: Score;
  target_level: TargetLevel;
  score_gap: number;
  priority: RecommendationPriority;
  estimated_timeline: string;
  guidance: ProgressionGuidance | null;
}

export interface NotScoreableRecommendation {
  kind: 'not_scoreable';
  area_id: string;
  area_name: string;
  section_id: string;
  section_name: string;
  reason: string;
}

export type Recommendation = NextStepRecommendation | NotScoreableRecommendation;

export interface RecommendationSummary {
  /** next_step entries only */
  total_count: number;
  by_priority: Record<RecommendationPriority, number>;
  not_scoreable_count: number;
}

// ============================================================
// Report
// ============================================================

export interface ImprovementPotential {
  current_tier: MaturityTier;
  next_tier: MaturityTier | null;
  next_tier_label: string | null;
  next_tier_min_score: number | null;
  gap_to_next_tier: number;
}

export interface TierDetails {
  name: string;
  short_name: string;
  description: string;
  characteristics: string[];
}

export interface AreaHighlight {
  area_id: string;
  area_name: string;
  section_id: string;
  mean: number;
  rank: number;
}

export interface ReportArea {
  area_id: string;
  area_name: string;
  score: number | null;
  answered: number;
  total_questions: number;
}

export type BenchmarkPosition = 'below_average' | 'above_average' | 'top_quartile' | 'best_in_class';

export interface ReportSection {
  section_id: string;
  section_name: string;
  description: string;
  record_field: SectionRecordField;
  score: number | null;
  coverage: number;
  benchmark: SectionBenchmark;
  benchmark_position: BenchmarkPosition | null;
  areas: ReportArea[];
  recommendations: Recommendation[];
}

export interface ImprovementRoadmap {
  current_state: {
    overall_score: number;
    maturity_level: string;
    completion_percentage: number;
  };
  immediate_actions: {
    description: string;
    estimated_duration: string;
    recommendations: NextStepRecommendation[];
  };
  // null once the top tier is reached
  target_state: {
    tier: MaturityTier;
    label: string;
    target_score: number;
    estimated_timeline: string;
  } | null;
}

export interface SectionSpread {
  variance: number;
  consistency: 'Excellent' | 'Good' | 'Fair' | 'Needs Attention';
  strongest_section_id: string;
  weakest_section_id: string;
}

export interface ReportResult {
  assessment_id: string;
  assessment_name: string;
  metadata: AssessmentMetadata;
  status: 'scored' | 'not_scoreable';
  not_scoreable_reason?: string;
  overall_score: number | null;
  classification: MaturityClassification | null;
  tier_details: TierDetails | null;
  improvement_potential: ImprovementPotential | null;
  sections: ReportSection[];
  recommendations: Recommendation[];
  summary: RecommendationSummary;
  roadmap: ImprovementRoadmap | null;
  strengths: AreaHighlight[];
  weaknesses: AreaHighlight[];
  section_spread: SectionSpread | null;
  completion: {
    answered: number;
    total_questions: number;
    percentage: number;
  };
  excluded: ExcludedResponse[];
  generated_at: string;
  scoring_version: string;
}

// ============================================================
// Progress
// ============================================================

export interface SectionProgress {
  section_id: string;
  section_name: string;
  answered: number;
  total_questions: number;
  percentage: number;
}

export interface AssessmentProgress {
  assessment_id: string;
  status: AssessmentStatus;
  total_questions: number;
  answered_questions: number;
  percentage: number;
  is_complete: boolean;
  sections: SectionProgress[];
  next_question_id: string | null;
  last_response_at: string | null;
}
