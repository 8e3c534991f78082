import sampleNames from './data/sample-names.json';
import type { CreateCustomerDto } from './dto/create-customer.dto';
import { toDateString } from './customer-normalizer';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

interface SegmentProfile {
  transactions: [number, number];
  spent: [number, number];
  daysSinceLastTransaction: [number, number];
  engagement: [number, number];
  tickets: [number, number];
}

// Every fourth customer looks like a churner, the next one is lukewarm,
// the remaining half are healthy.
const PROFILES: readonly SegmentProfile[] = [
  {
    transactions: [0, 2],
    spent: [0, 100],
    daysSinceLastTransaction: [90, 365],
    engagement: [10, 30],
    tickets: [3, 8],
  },
  {
    transactions: [3, 8],
    spent: [100, 500],
    daysSinceLastTransaction: [30, 90],
    engagement: [40, 60],
    tickets: [1, 3],
  },
  {
    transactions: [10, 50],
    spent: [500, 5000],
    daysSinceLastTransaction: [1, 30],
    engagement: [70, 95],
    tickets: [0, 2],
  },
];

export type RandomSource = () => number;

/**
 * Synthetic customer rows for demos. `random` must return values in [0, 1),
 * like Math.random.
 */
export function generateSampleCustomers(
  count = 50,
  now: Date = new Date(),
  random: RandomSource = Math.random,
): CreateCustomerDto[] {
  const randomInt = ([min, max]: [number, number]): number =>
    min + Math.floor(random() * (max - min + 1));
  const randomAmount = ([min, max]: [number, number]): number =>
    Math.round((min + random() * (max - min)) * 100) / 100;
  const daysAgo = (days: number): string =>
    toDateString(new Date(now.getTime() - days * MS_PER_DAY)) ?? '';

  return Array.from({ length: count }, (_, i) => {
    const name = sampleNames[i % sampleNames.length];
    const profile = PROFILES[Math.min(i % 4, 2)];

    return {
      name,
      email: `${name.toLowerCase().replace(/ /g, '.')}@example.com`,
      phone: `+1-555-${randomInt([100, 999])}-${randomInt([1000, 9999])}`,
      registrationDate: daysAgo(randomInt([180, 730])),
      lastTransactionDate: daysAgo(randomInt(profile.daysSinceLastTransaction)),
      transactionCount: randomInt(profile.transactions),
      totalSpent: randomAmount(profile.spent),
      engagementScore: randomInt(profile.engagement),
      supportTickets: randomInt(profile.tickets),
    };
  });
}
