import type {
  CustomerWithScore,
  DashboardStats,
  HighRiskCustomer,
} from '../../customers/interfaces/customer-store.interface';
import type { Intent } from '../intent-matcher';

export interface ChurnRateSummary {
  churnRate: number;
  highRisk: number;
  total: number;
}

export interface RevenueSummary {
  totalRevenue: number;
  atRiskRevenue: number;
}

export type ChatResponseData =
  | HighRiskCustomer[]
  | CustomerWithScore[]
  | CustomerWithScore
  | DashboardStats
  | ChurnRateSummary
  | RevenueSummary
  | null;

export interface ChatResponse {
  intent: Intent;
  text: string;
  data: ChatResponseData;
}
