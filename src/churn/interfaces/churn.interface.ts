export enum RiskLevel {
  LOW = 'Low',
  MEDIUM = 'Medium',
  HIGH = 'High',
}

/** Probability at or above which a customer is High risk */
export const HIGH_RISK_THRESHOLD = 0.7;
/** Probability at or above which a customer is at least Medium risk */
export const MEDIUM_RISK_THRESHOLD = 0.4;

/**
 * Anything shaped like a customer record. Every field is optional and
 * loosely typed: rows from uploads, the database and tests all pass through
 * the extractor unchanged.
 */
export interface ChurnInput {
  id?: number | null;
  name?: string | null;
  email?: string | null;
  registrationDate?: Date | string | null;
  lastTransactionDate?: Date | string | null;
  transactionCount?: number | string | null;
  totalSpent?: number | string | null;
  engagementScore?: number | string | null;
  supportTickets?: number | string | null;
}

export interface FeatureVector {
  recencyDays: number;
  frequency: number;
  monetary: number;
  avgTransaction: number;
  engagementScore: number;
  accountAgeDays: number;
  supportTickets: number;
}

export interface ChurnPrediction {
  churnProbability: number;
  riskLevel: RiskLevel;
}

export interface ScoredCustomer extends ChurnPrediction {
  customerId: number | null;
  customerName: string;
  email: string;
  features: FeatureVector;
  scoredAt: Date;
}

export type ReasonImpact = 'High' | 'Medium';

export interface ChurnReason {
  factor: string;
  description: string;
  impact: ReasonImpact;
}

/**
 * Strategy turning a feature vector into a churn probability.
 * Implementations must be pure: the same features always give the same result.
 */
export interface ChurnScorer {
  readonly name: string;
  score(features: FeatureVector): ChurnPrediction;
}

export const CHURN_SCORER = 'CHURN_SCORER';

export function toRiskLevel(probability: number): RiskLevel {
  if (probability >= HIGH_RISK_THRESHOLD) return RiskLevel.HIGH;
  if (probability >= MEDIUM_RISK_THRESHOLD) return RiskLevel.MEDIUM;
  return RiskLevel.LOW;
}

/** Clamp into [0, 1] and round to 3 decimals for reporting */
export function normalizeProbability(raw: number): number {
  const clamped = Math.min(Math.max(raw, 0), 1);
  return Math.round(clamped * 1000) / 1000;
}
