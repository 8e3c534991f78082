export type Sentiment = 'positive' | 'negative' | 'neutral';

export interface SentimentResult {
  sentiment: Sentiment;
  score: number;
}

const POSITIVE_WORDS: ReadonlySet<string> = new Set([
  'good',
  'great',
  'excellent',
  'happy',
  'satisfied',
  'love',
  'amazing',
]);

const NEGATIVE_WORDS: ReadonlySet<string> = new Set([
  'bad',
  'poor',
  'terrible',
  'unhappy',
  'disappointed',
  'hate',
  'worst',
]);

const NEUTRAL_SCORE = 0.5;

function round2(value: number): number {
  return Math.round(Math.min(Math.max(value, 0), 1) * 100) / 100;
}

/**
 * Keyword sentiment. Each distinct listed word counts once; whole words only,
 * so "unhappy" is not also read as "happy". Scores lie in [0, 1].
 */
export function analyzeSentiment(text: string): SentimentResult {
  const words = new Set(text.toLowerCase().match(/[a-z']+/g) ?? []);
  let positive = 0;
  let negative = 0;
  for (const word of words) {
    if (POSITIVE_WORDS.has(word)) positive += 1;
    if (NEGATIVE_WORDS.has(word)) negative += 1;
  }

  if (positive > negative) {
    return { sentiment: 'positive', score: round2(0.7 + positive * 0.1) };
  }
  if (negative > positive) {
    return { sentiment: 'negative', score: round2(0.3 - negative * 0.1) };
  }
  return { sentiment: 'neutral', score: NEUTRAL_SCORE };
}
