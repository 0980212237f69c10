/**
 * Maturity tier classification
 *
 * Tier lower bounds (inclusive):
 * - Traditional:  1.0
 * - AI-Assisted:  1.8
 * - AI-Augmented: 2.5
 * - AI-First:     3.3
 * A score belongs to the highest tier whose lower bound it reaches,
 * so 2.45 is AI-Assisted and 2.5 is AI-Augmented.
 */

import { clamp, roundTo } from './utils';
import type {
  ImprovementPotential,
  MaturityClassification,
  MaturityTier,
  Score,
  TierDetails,
} from './types';

export const SCORE_MIN = 1;
export const SCORE_MAX = 4;

export const MATURITY_TIERS = [
  { tier: 'TRADITIONAL', label: 'Traditional', level: 1, min: 1.0 },
  { tier: 'AI_ASSISTED', label: 'AI-Assisted', level: 2, min: 1.8 },
  { tier: 'AI_AUGMENTED', label: 'AI-Augmented', level: 3, min: 2.5 },
  { tier: 'AI_FIRST', label: 'AI-First', level: 4, min: 3.3 },
] as const satisfies ReadonlyArray<{ tier: MaturityTier; label: string; level: Score; min: number }>;

type TierDefinition = (typeof MATURITY_TIERS)[number];

const TIER_DETAILS: Record<MaturityTier, TierDetails> = {
  TRADITIONAL: {
    name: 'Traditional Development',
    short_name: 'Basic',
    description: 'Manual development with limited AI integration',
    characteristics: [
      'No AI tools in regular use',
      'Manual coding and review processes',
      'Traditional project management',
      'Limited automation',
    ],
  },
  AI_ASSISTED: {
    name: 'AI-Assisted Development',
    short_name: 'Developing',
    description: 'Basic AI tools support individual developers',
    characteristics: [
      'Individual use of AI assistants',
      'Basic code completion and suggestions',
      'Some automated documentation',
      'Limited team-wide adoption',
    ],
  },
  AI_AUGMENTED: {
    name: 'AI-Augmented Development',
    short_name: 'Advanced',
    description: 'Systematic AI integration across lifecycle',
    characteristics: [
      'Team-wide AI tool adoption',
      'AI-generated code with human review',
      'Automated testing and quality assurance',
      'Intelligent CI/CD pipelines',
    ],
  },
  AI_FIRST: {
    name: 'AI-First Development',
    short_name: 'Optimized',
    description: 'AI-native development with autonomous systems',
    characteristics: [
      'AI-first development mindset',
      'Autonomous code generation and review',
      'Self-healing systems',
      'Predictive and proactive automation',
    ],
  },
};

// Keys are lowercased with everything but letters and digits removed
const TIER_ALIASES: Record<string, MaturityTier> = {
  traditional: 'TRADITIONAL',
  traditionaldevelopment: 'TRADITIONAL',
  basic: 'TRADITIONAL',
  assisted: 'AI_ASSISTED',
  aiassisted: 'AI_ASSISTED',
  aiassisteddevelopment: 'AI_ASSISTED',
  developing: 'AI_ASSISTED',
  augmented: 'AI_AUGMENTED',
  aiaugmented: 'AI_AUGMENTED',
  aiaugmenteddevelopment: 'AI_AUGMENTED',
  advanced: 'AI_AUGMENTED',
  first: 'AI_FIRST',
  aifirst: 'AI_FIRST',
  aifirstdevelopment: 'AI_FIRST',
  optimized: 'AI_FIRST',
};

/**
 * Clamps to [1,4] and rounds to two decimals, the resolution tiers are defined at
 */
export const normalizeScore = (score: number): number => {
  if (!Number.isFinite(score)) {
    throw new RangeError(`Score must be a finite number, got ${score}`);
  }
  return roundTo(clamp(score, SCORE_MIN, SCORE_MAX), 2);
};

function findTier(score: number): TierDefinition {
  const value = normalizeScore(score);
  let found: TierDefinition = MATURITY_TIERS[0];
  for (const def of MATURITY_TIERS) {
    if (value >= def.min) found = def;
  }
  return found;
}

export const classifyMaturity = (score: number): MaturityClassification => {
  const { tier, label, level } = findTier(score);
  return { tier, label, level };
};

export const getTierLabel = (tier: MaturityTier): string => {
  const def = MATURITY_TIERS.find(d => d.tier === tier);
  return def ? def.label : tier;
};

/**
 * Maps display aliases ("Assisted", "AI-Assisted Development", "Optimized", ...)
 * to the canonical tier; null when the label is not recognized
 */
export const resolveTierAlias = (label: string | null | undefined): MaturityTier | null => {
  if (label == null) return null;
  const key = label.toLowerCase().replace(/[^a-z0-9]/g, '');
  return TIER_ALIASES[key] ?? null;
};

export const getTierDetails = (tier: MaturityTier): TierDetails => TIER_DETAILS[tier];

export const computeImprovementPotential = (score: number): ImprovementPotential => {
  const value = normalizeScore(score);
  const current = findTier(value);
  const next = MATURITY_TIERS.find(d => d.min > current.min);
  if (!next) {
    return {
      current_tier: current.tier,
      next_tier: null,
      next_tier_label: null,
      next_tier_min_score: null,
      gap_to_next_tier: 0,
    };
  }
  return {
    current_tier: current.tier,
    next_tier: next.tier,
    next_tier_label: next.label,
    next_tier_min_score: next.min,
    gap_to_next_tier: roundTo(next.min - value, 2),
  };
};

/**
 * Badge colors per tier (Tailwind)
 */
export const getTierBadgeClass = (tier: MaturityTier): string => {
  switch (tier) {
    case 'TRADITIONAL': return 'bg-red-50 border-red-200 text-red-900';
    case 'AI_ASSISTED': return 'bg-yellow-50 border-yellow-200 text-yellow-900';
    case 'AI_AUGMENTED': return 'bg-blue-50 border-blue-200 text-blue-900';
    case 'AI_FIRST': return 'bg-green-50 border-green-200 text-green-900';
  }
};
