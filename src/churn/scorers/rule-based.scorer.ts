import { Injectable } from '@nestjs/common';
import {
  ChurnPrediction,
  ChurnReason,
  ChurnScorer,
  FeatureVector,
  normalizeProbability,
  toRiskLevel,
} from '../interfaces/churn.interface';

type Comparison = 'eq' | 'lt' | 'lte' | 'gt';

interface Bucket {
  when: Comparison;
  bound: number;
  contribution: number;
}

export type ScoredFactor = Extract<
  keyof FeatureVector,
  'recencyDays' | 'frequency' | 'monetary' | 'engagementScore' | 'supportTickets'
>;

export interface FactorRule {
  factor: ScoredFactor;
  weight: number;
  buckets: readonly Bucket[];
  /** Contribution when no bucket matches */
  otherwise: number;
}

/**
 * Weighted-bucket rule set. Buckets are tested top to bottom and the first
 * match wins. Weights add up to 1.0.
 */
export const CHURN_RULES: readonly FactorRule[] = [
  {
    factor: 'recencyDays',
    weight: 0.4,
    buckets: [
      { when: 'gt', bound: 90, contribution: 0.4 },
      { when: 'gt', bound: 60, contribution: 0.3 },
      { when: 'gt', bound: 30, contribution: 0.15 },
    ],
    otherwise: 0.05,
  },
  {
    factor: 'frequency',
    weight: 0.25,
    buckets: [
      { when: 'eq', bound: 0, contribution: 0.25 },
      { when: 'lte', bound: 2, contribution: 0.2 },
      { when: 'lte', bound: 5, contribution: 0.1 },
    ],
    otherwise: 0.02,
  },
  {
    factor: 'monetary',
    weight: 0.2,
    buckets: [
      { when: 'eq', bound: 0, contribution: 0.2 },
      { when: 'lt', bound: 50, contribution: 0.15 },
      { when: 'lt', bound: 200, contribution: 0.08 },
    ],
    otherwise: 0.02,
  },
  {
    factor: 'engagementScore',
    weight: 0.1,
    buckets: [
      { when: 'lt', bound: 30, contribution: 0.1 },
      { when: 'lt', bound: 50, contribution: 0.06 },
      { when: 'lt', bound: 70, contribution: 0.03 },
    ],
    otherwise: 0,
  },
  {
    factor: 'supportTickets',
    weight: 0.05,
    buckets: [
      { when: 'gt', bound: 5, contribution: 0.05 },
      { when: 'gt', bound: 2, contribution: 0.03 },
    ],
    otherwise: 0,
  },
];

function matches(value: number, bucket: Bucket): boolean {
  switch (bucket.when) {
    case 'eq':
      return value === bucket.bound;
    case 'lt':
      return value < bucket.bound;
    case 'lte':
      return value <= bucket.bound;
    case 'gt':
      return value > bucket.bound;
  }
}

export function factorContribution(rule: FactorRule, value: number): number {
  const bucket = rule.buckets.find((b) => matches(value, b));
  const contribution = bucket ? bucket.contribution : rule.otherwise;
  return Math.min(contribution, rule.weight);
}

@Injectable()
export class RuleBasedScorer implements ChurnScorer {
  readonly name = 'rules';

  contributions(features: FeatureVector): Record<ScoredFactor, number> {
    const result: Record<ScoredFactor, number> = {
      recencyDays: 0,
      frequency: 0,
      monetary: 0,
      engagementScore: 0,
      supportTickets: 0,
    };
    for (const rule of CHURN_RULES) {
      result[rule.factor] = factorContribution(rule, features[rule.factor]);
    }
    return result;
  }

  score(features: FeatureVector): ChurnPrediction {
    const raw = Object.values(this.contributions(features)).reduce(
      (sum, value) => sum + value,
      0,
    );
    const churnProbability = normalizeProbability(raw);
    return { churnProbability, riskLevel: toRiskLevel(churnProbability) };
  }
}

/**
 * Human-readable churn drivers, always in the order
 * recency, frequency, monetary, support tickets, engagement.
 */
export function explainChurnRisk(features: FeatureVector): ChurnReason[] {
  const reasons: ChurnReason[] = [];

  if (features.recencyDays > 60) {
    reasons.push({
      factor: 'Inactivity',
      description: `No transaction in ${features.recencyDays} days`,
      impact: 'High',
    });
  }

  if (features.frequency <= 2) {
    reasons.push({
      factor: 'Low Engagement',
      description: `Only ${features.frequency} transactions`,
      impact: 'High',
    });
  }

  if (features.monetary < 100) {
    reasons.push({
      factor: 'Low Value',
      description: `Total spent: $${features.monetary.toFixed(2)}`,
      impact: 'Medium',
    });
  }

  if (features.supportTickets > 3) {
    reasons.push({
      factor: 'Support Issues',
      description: `${features.supportTickets} support tickets`,
      impact: 'Medium',
    });
  }

  if (features.engagementScore < 40) {
    reasons.push({
      factor: 'Poor Engagement',
      description: `Engagement score: ${features.engagementScore}/100`,
      impact: 'High',
    });
  }

  return reasons;
}
