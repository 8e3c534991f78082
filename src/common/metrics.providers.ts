import {
  makeCounterProvider,
  makeHistogramProvider,
} from '@willsoto/nestjs-prometheus';

export const CHURN_PREDICTIONS_TOTAL = 'churn_predictions_total';
export const CHURN_BATCH_DURATION = 'churn_batch_duration_seconds';
export const CHATBOT_QUERIES_TOTAL = 'chatbot_queries_total';
export const CAMPAIGN_EVENTS_TOTAL = 'campaign_events_total';

export const churnMetricsProviders = [
  makeCounterProvider({
    name: CHURN_PREDICTIONS_TOTAL,
    help: 'Total number of churn predictions by risk level',
    labelNames: ['risk_level', 'scorer'],
  }),
  makeHistogramProvider({
    name: CHURN_BATCH_DURATION,
    help: 'Duration of batch churn prediction in seconds',
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 5],
  }),
];

export const chatbotMetricsProviders = [
  makeCounterProvider({
    name: CHATBOT_QUERIES_TOTAL,
    help: 'Total number of chatbot queries by matched intent',
    labelNames: ['intent'],
  }),
];

export const campaignMetricsProviders = [
  makeCounterProvider({
    name: CAMPAIGN_EVENTS_TOTAL,
    help: 'Total number of campaign events created',
    labelNames: ['channel', 'status'],
  }),
];
