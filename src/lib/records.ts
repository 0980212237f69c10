/**
 * Schemas for records read back from storage
 */

import { z } from 'zod';
import type { Assessment, ManifestData, ReportResult, ResponsesData } from './types';

export const assessmentStatusSchema = z.enum(['DRAFT', 'IN_PROGRESS', 'COMPLETED']);

const scoreSchema = z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]);
const targetLevelSchema = z.union([z.literal(2), z.literal(3), z.literal(4)]);

export const assessmentSchema: z.ZodType<Assessment, z.ZodTypeDef, unknown> = z.object({
  assessment_id: z.string().min(1),
  team_name: z.string().optional(),
  organization_name: z.string().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  email: z.string().optional(),
  industry: z.string().optional(),
  assessor_name: z.string().optional(),
  status: assessmentStatusSchema,
  created_at: z.string(),
  updated_at: z.string(),
  completion_date: z.string().nullable().default(null),
  overall_score: z.number().nullable().default(null),
  foundational_score: z.number().nullable().default(null),
  transformation_score: z.number().nullable().default(null),
  enterprise_score: z.number().nullable().default(null),
  governance_score: z.number().nullable().default(null),
  deviq_classification: z.string().nullable().default(null),
  results_json: z.string().nullable().default(null),
});

export const responsesDataSchema: z.ZodType<ResponsesData, z.ZodTypeDef, unknown> = z.object({
  responses: z.array(
    z.object({
      response_id: z.string(),
      assessment_id: z.string(),
      question_id: z.string(),
      score: scoreSchema,
      note: z.string().optional(),
      response_time_seconds: z.number().optional(),
      timestamp: z.string(),
    }),
  ),
  updated_at: z.string(),
});

export const manifestDataSchema: z.ZodType<ManifestData, z.ZodTypeDef, unknown> = z.object({
  entries: z.array(
    z.object({
      assessment_id: z.string(),
      assessment_file_id: z.string(),
      status: assessmentStatusSchema,
      team_name: z.string().optional(),
      created_at: z.string(),
      updated_at: z.string(),
    }),
  ),
  updated_at: z.string(),
});

// ============================================================
// Frozen report (results_json)
// ============================================================

const tierSchema = z.enum(['TRADITIONAL', 'AI_ASSISTED', 'AI_AUGMENTED', 'AI_FIRST']);
const prioritySchema = z.enum(['high', 'medium', 'low']);
const recordFieldSchema = z.enum([
  'foundational_score',
  'transformation_score',
  'enterprise_score',
  'governance_score',
]);

const classificationSchema = z.object({
  tier: tierSchema,
  label: z.string(),
  level: scoreSchema,
});

const nextStepSchema = z.object({
  kind: z.literal('next_step'),
  rank: z.number(),
  area_id: z.string(),
  area_name: z.string(),
  section_id: z.string(),
  section_name: z.string(),
  area_score: z.number(),
  current_level: scoreSchema,
  target_level: targetLevelSchema,
  score_gap: z.number(),
  priority: prioritySchema,
  estimated_timeline: z.string(),
  guidance: z
    .object({
      prerequisites: z.array(z.string()),
      action_items: z.array(z.object({ category: z.string().nullable(), items: z.array(z.string()) })),
      success_metrics: z.array(z.string()),
      timeline: z.string(),
      common_pitfall: z.string(),
    })
    .nullable(),
});

const recommendationSchema = z.discriminatedUnion('kind', [
  nextStepSchema,
  z.object({
    kind: z.literal('not_scoreable'),
    area_id: z.string(),
    area_name: z.string(),
    section_id: z.string(),
    section_name: z.string(),
    reason: z.string(),
  }),
]);

const highlightSchema = z.object({
  area_id: z.string(),
  area_name: z.string(),
  section_id: z.string(),
  mean: z.number(),
  rank: z.number(),
});

export const reportResultSchema: z.ZodType<ReportResult, z.ZodTypeDef, unknown> = z.object({
  assessment_id: z.string(),
  assessment_name: z.string(),
  metadata: z.object({
    team_name: z.string().optional(),
    organization_name: z.string().optional(),
    first_name: z.string().optional(),
    last_name: z.string().optional(),
    email: z.string().optional(),
    industry: z.string().optional(),
    assessor_name: z.string().optional(),
  }),
  status: z.enum(['scored', 'not_scoreable']),
  not_scoreable_reason: z.string().optional(),
  overall_score: z.number().nullable(),
  classification: classificationSchema.nullable(),
  tier_details: z
    .object({
      name: z.string(),
      short_name: z.string(),
      description: z.string(),
      characteristics: z.array(z.string()),
    })
    .nullable(),
  improvement_potential: z
    .object({
      current_tier: tierSchema,
      next_tier: tierSchema.nullable(),
      next_tier_label: z.string().nullable(),
      next_tier_min_score: z.number().nullable(),
      gap_to_next_tier: z.number(),
    })
    .nullable(),
  sections: z.array(
    z.object({
      section_id: z.string(),
      section_name: z.string(),
      description: z.string(),
      record_field: recordFieldSchema,
      score: z.number().nullable(),
      coverage: z.number(),
      benchmark: z.object({
        industry_average: z.number(),
        top_quartile: z.number(),
        best_in_class: z.number(),
      }),
      benchmark_position: z.enum(['below_average', 'above_average', 'top_quartile', 'best_in_class']).nullable(),
      areas: z.array(
        z.object({
          area_id: z.string(),
          area_name: z.string(),
          score: z.number().nullable(),
          answered: z.number(),
          total_questions: z.number(),
        }),
      ),
      recommendations: z.array(recommendationSchema),
    }),
  ),
  recommendations: z.array(recommendationSchema),
  summary: z.object({
    total_count: z.number(),
    by_priority: z.object({ high: z.number(), medium: z.number(), low: z.number() }),
    not_scoreable_count: z.number(),
  }),
  roadmap: z
    .object({
      current_state: z.object({
        overall_score: z.number(),
        maturity_level: z.string(),
        completion_percentage: z.number(),
      }),
      immediate_actions: z.object({
        description: z.string(),
        estimated_duration: z.string(),
        recommendations: z.array(nextStepSchema),
      }),
      target_state: z
        .object({
          tier: tierSchema,
          label: z.string(),
          target_score: z.number(),
          estimated_timeline: z.string(),
        })
        .nullable(),
    })
    .nullable(),
  strengths: z.array(highlightSchema),
  weaknesses: z.array(highlightSchema),
  section_spread: z
    .object({
      variance: z.number(),
      consistency: z.enum(['Excellent', 'Good', 'Fair', 'Needs Attention']),
      strongest_section_id: z.string(),
      weakest_section_id: z.string(),
    })
    .nullable(),
  completion: z.object({
    answered: z.number(),
    total_questions: z.number(),
    percentage: z.number(),
  }),
  excluded: z.array(
    z.object({
      question_id: z.string(),
      reason: z.enum(['unknown_question', 'inactive_question', 'invalid_score']),
    }),
  ),
  generated_at: z.string(),
  scoring_version: z.string(),
});
