import type {
  FeatureVector,
  RiskLevel,
  ScoredCustomer,
} from '../../churn/interfaces/churn.interface';

export interface CustomerRecord {
  id: number;
  name: string;
  email: string;
  phone: string | null;
  registrationDate: string | null;
  lastTransactionDate: string | null;
  transactionCount: number;
  totalSpent: number;
  engagementScore: number;
  supportTickets: number;
}

export type NewCustomer = Omit<CustomerRecord, 'id'>;

/** A customer joined with its current churn score, if it has one */
export interface CustomerWithScore extends CustomerRecord {
  churnProbability: number | null;
  riskLevel: RiskLevel | null;
  features: FeatureVector | null;
  scoredAt: Date | null;
}

export interface HighRiskCustomer extends CustomerRecord {
  churnProbability: number;
  riskLevel: RiskLevel;
}

export interface DashboardStats {
  totalCustomers: number;
  highRiskCount: number;
  mediumRiskCount: number;
  lowRiskCount: number;
  totalRevenue: number;
  atRiskRevenue: number;
  activeCampaigns: number;
}

export interface RiskDistributionEntry {
  riskLevel: RiskLevel;
  count: number;
}

/**
 * Storage the churn engine and the chatbot read from and write to.
 * Implementations keep at most one current score per customer.
 */
export interface CustomerStore {
  /** Scored customers at or above the threshold, highest probability first */
  getHighRiskCustomers(threshold?: number): Promise<HighRiskCustomer[]>;
  getCustomerDetail(id: number): Promise<CustomerWithScore | null>;
  /** Most recently active customers first */
  getRecentCustomers(limit?: number): Promise<CustomerWithScore[]>;
  getCustomersWithScores(): Promise<CustomerWithScore[]>;
  getDashboardStats(): Promise<DashboardStats>;
  getChurnDistribution(): Promise<RiskDistributionEntry[]>;
  /** Returns how many records were inserted */
  addCustomers(records: NewCustomer[]): Promise<number>;
  /** Inserts and returns the persisted records, skipping rows that fail */
  saveCustomers(records: NewCustomer[]): Promise<CustomerRecord[]>;
  /** Replaces the current score of every customer in the batch */
  addChurnScores(results: ScoredCustomer[]): Promise<void>;
}

export const CUSTOMER_STORE = 'CUSTOMER_STORE';
