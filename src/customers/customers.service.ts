import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ChurnPredictorService } from '../churn/churn-predictor.service';
import { RiskLevel } from '../churn/interfaces/churn.interface';
import type {
  ChurnInput,
  ChurnReason,
  ScoredCustomer,
} from '../churn/interfaces/churn.interface';
import { normalizeCustomer } from './customer-normalizer';
import type { CreateCustomerDto } from './dto/create-customer.dto';
import { CUSTOMER_STORE } from './interfaces/customer-store.interface';
import type {
  CustomerStore,
  CustomerWithScore,
} from './interfaces/customer-store.interface';

export interface ScoringSummary {
  customersCount: number;
  highRiskCount: number;
  predictions: ScoredCustomer[];
}

export interface CustomerInsight extends CustomerWithScore {
  reasons: ChurnReason[];
}

@Injectable()
export class CustomersService {
  private readonly logger = new Logger(CustomersService.name);

  constructor(
    @Inject(CUSTOMER_STORE) private readonly store: CustomerStore,
    private readonly predictor: ChurnPredictorService,
  ) {}

  /**
   * Store the rows, then score them once they carry persisted ids.
   */
  async ingest(rows: CreateCustomerDto[]): Promise<ScoringSummary> {
    const saved = await this.store.saveCustomers(rows.map(normalizeCustomer));
    if (saved.length < rows.length) {
      this.logger.warn(
        `Stored ${saved.length} of ${rows.length} uploaded customers`,
      );
    }

    return this.scoreAndStore(saved);
  }

  /** Rescore every stored customer; each new score replaces the old one */
  async rescoreAll(): Promise<ScoringSummary> {
    const customers = await this.store.getCustomersWithScores();
    return this.scoreAndStore(customers);
  }

  async findAll(): Promise<CustomerWithScore[]> {
    return this.store.getCustomersWithScores();
  }

  async findOne(id: number): Promise<CustomerInsight> {
    const customer = await this.store.getCustomerDetail(id);
    if (!customer) {
      throw new NotFoundException(`Customer with ID ${id} not found`);
    }

    return { ...customer, reasons: this.predictor.explain(customer) };
  }

  private async scoreAndStore(
    customers: ChurnInput[],
  ): Promise<ScoringSummary> {
    const predictions = this.predictor.predictAll(customers);
    await this.store.addChurnScores(predictions);

    const highRiskCount = predictions.filter(
      (p) => p.riskLevel === RiskLevel.HIGH,
    ).length;
    this.logger.log(
      `Scored ${predictions.length} customers, ${highRiskCount} high risk`,
    );

    return { customersCount: predictions.length, highRiskCount, predictions };
  }
}
