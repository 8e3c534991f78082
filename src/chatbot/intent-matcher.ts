export enum Intent {
  HIGH_RISK = 'high_risk',
  TOTAL_CUSTOMERS = 'total_customers',
  CHURN_RATE = 'churn_rate',
  RECENT_ACTIVITY = 'recent_activity',
  REVENUE = 'revenue',
  SPECIFIC_CUSTOMER = 'specific_customer',
  HELP = 'help',
  UNKNOWN = 'unknown',
}

export interface IntentPatterns {
  intent: Exclude<Intent, Intent.UNKNOWN>;
  patterns: readonly RegExp[];
}

/**
 * Tested in order against the lower-cased message; the first intent with a
 * matching pattern wins. Messages that fit several intents therefore resolve
 * to the earliest one, e.g. "revenue from high risk customers" is HIGH_RISK.
 */
export const INTENT_PATTERNS: readonly IntentPatterns[] = [
  {
    intent: Intent.HIGH_RISK,
    patterns: [
      /high[- ]risk.*customers?/,
      /customers?.*high[- ]risk/,
      /who.*likely.*churn/,
      /at risk customers?/,
      /customers?.*at risk/,
    ],
  },
  {
    intent: Intent.TOTAL_CUSTOMERS,
    patterns: [
      /how many customers?/,
      /total customers?/,
      /number.*customers?/,
      /count.*customers?/,
    ],
  },
  {
    intent: Intent.CHURN_RATE,
    patterns: [/churn rate/, /what.*churn rate/, /percentage.*churned/],
  },
  {
    intent: Intent.RECENT_ACTIVITY,
    patterns: [
      /recent.*activity/,
      /latest.*transactions?/,
      /recent.*customers?/,
      /latest.*customers?/,
    ],
  },
  {
    intent: Intent.REVENUE,
    patterns: [/revenue/, /total.*spent/, /sales/, /monetary.*value/],
  },
  {
    intent: Intent.SPECIFIC_CUSTOMER,
    patterns: [
      /customer.*(\d+)/,
      /tell me about.*customer/,
      /show.*customer.*(\d+)/,
      /info.*customer/,
      /show.*customer/,
      /customer.*info/,
    ],
  },
  {
    intent: Intent.HELP,
    patterns: [/help/, /what can you do/, /how.*use/, /commands/],
  },
];

export function normalizeMessage(message: string): string {
  return message.toLowerCase().trim();
}

export function classifyIntent(message: string): Intent {
  const normalized = normalizeMessage(message);
  const match = INTENT_PATTERNS.find(({ patterns }) =>
    patterns.some((pattern) => pattern.test(normalized)),
  );
  return match ? match.intent : Intent.UNKNOWN;
}

/** Digits of the first integer following the word "customer", without leading zeros */
export function extractCustomerIdDigits(message: string): string | null {
  const match = /customer.*?(\d+)/.exec(normalizeMessage(message));
  return match ? match[1].replace(/^0+(?=\d)/, '') : null;
}

/** Null when no id is given or it is too large to be stored exactly */
export function extractCustomerId(message: string): number | null {
  const digits = extractCustomerIdDigits(message);
  if (digits === null) {
    return null;
  }
  const id = Number(digits);
  return Number.isSafeInteger(id) ? id : null;
}
