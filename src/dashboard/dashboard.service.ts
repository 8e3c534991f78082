import { Inject, Injectable } from '@nestjs/common';
import { CUSTOMER_STORE } from '../customers/interfaces/customer-store.interface';
import type {
  CustomerStore,
  DashboardStats,
  RiskDistributionEntry,
} from '../customers/interfaces/customer-store.interface';
import { FeedbackService } from '../feedback/feedback.service';
import type { FeedbackView } from '../feedback/feedback.service';

export interface DashboardAnalytics {
  stats: DashboardStats;
  churnDistribution: RiskDistributionEntry[];
  recentFeedback: FeedbackView[];
}

@Injectable()
export class DashboardService {
  constructor(
    @Inject(CUSTOMER_STORE) private readonly store: CustomerStore,
    private readonly feedbackService: FeedbackService,
  ) {}

  getStats(): Promise<DashboardStats> {
    return this.store.getDashboardStats();
  }

  async getAnalytics(): Promise<DashboardAnalytics> {
    const [stats, churnDistribution, recentFeedback] = await Promise.all([
      this.store.getDashboardStats(),
      this.store.getChurnDistribution(),
      this.feedbackService.recent(10),
    ]);
    return { stats, churnDistribution, recentFeedback };
  }
}
