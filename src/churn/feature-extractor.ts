import type { ChurnInput, FeatureVector } from './interfaces/churn.interface';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const FEATURE_DEFAULTS = {
  recencyDays: 365,
  frequency: 0,
  monetary: 0,
  engagementScore: 50,
  accountAgeDays: 180,
  supportTickets: 0,
} as const;

/**
 * Build the feature vector for one customer.
 *
 * Absent, empty or unparseable fields fall back to FEATURE_DEFAULTS, so this
 * never throws. Day counts are whole days, floored.
 */
export function extractFeatures(
  record: ChurnInput,
  now: Date = new Date(),
): FeatureVector {
  const frequency =
    toNumber(record.transactionCount) ?? FEATURE_DEFAULTS.frequency;
  const monetary = toNumber(record.totalSpent) ?? FEATURE_DEFAULTS.monetary;

  return {
    recencyDays:
      daysSince(record.lastTransactionDate, now) ?? FEATURE_DEFAULTS.recencyDays,
    frequency,
    monetary,
    avgTransaction: frequency > 0 ? monetary / frequency : 0,
    engagementScore:
      toNumber(record.engagementScore) ?? FEATURE_DEFAULTS.engagementScore,
    accountAgeDays:
      daysSince(record.registrationDate, now) ?? FEATURE_DEFAULTS.accountAgeDays,
    supportTickets:
      toNumber(record.supportTickets) ?? FEATURE_DEFAULTS.supportTickets,
  };
}

export function parseDate(value: Date | string | null | undefined): Date | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' && value.trim() === '') return null;

  const date = value instanceof Date ? value : new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function daysSince(
  value: Date | string | null | undefined,
  now: Date,
): number | null {
  const date = parseDate(value);
  if (!date) return null;
  return Math.floor((now.getTime() - date.getTime()) / MS_PER_DAY);
}

function toNumber(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' && value.trim() === '') return null;

  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}
