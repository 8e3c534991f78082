import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { Campaign } from '../campaigns/campaign.entity';
import {
  HIGH_RISK_THRESHOLD,
  RiskLevel,
} from '../churn/interfaces/churn.interface';
import type { ScoredCustomer } from '../churn/interfaces/churn.interface';
import { ChurnScore } from './churn-score.entity';
import { Customer } from './customer.entity';
import type {
  CustomerRecord,
  CustomerStore,
  CustomerWithScore,
  DashboardStats,
  HighRiskCustomer,
  NewCustomer,
  RiskDistributionEntry,
} from './interfaces/customer-store.interface';

// Keeps IN (...) lists under the SQLite bound-parameter limit
const ID_CHUNK_SIZE = 500;

type NumericRaw = string | number | null | undefined;

@Injectable()
export class TypeOrmCustomerStore implements CustomerStore {
  private readonly logger = new Logger(TypeOrmCustomerStore.name);

  constructor(
    @InjectRepository(Customer)
    private readonly customerRepository: Repository<Customer>,
    @InjectRepository(ChurnScore)
    private readonly scoreRepository: Repository<ChurnScore>,
    @InjectRepository(Campaign)
    private readonly campaignRepository: Repository<Campaign>,
  ) {}

  async getHighRiskCustomers(
    threshold = HIGH_RISK_THRESHOLD,
  ): Promise<HighRiskCustomer[]> {
    const customers = await this.customerRepository
      .createQueryBuilder('customer')
      .innerJoinAndSelect('customer.score', 'score')
      .where('score.churnProbability >= :threshold', { threshold })
      .orderBy('score.churnProbability', 'DESC')
      .addOrderBy('customer.id', 'ASC')
      .getMany();

    return customers.flatMap((customer) =>
      customer.score
        ? [
            {
              ...toRecord(customer),
              churnProbability: customer.score.churnProbability,
              riskLevel: customer.score.riskLevel,
            },
          ]
        : [],
    );
  }

  async getCustomerDetail(id: number): Promise<CustomerWithScore | null> {
    const customer = await this.customerRepository.findOne({
      where: { id },
      relations: { score: true },
    });
    return customer ? toView(customer) : null;
  }

  async getRecentCustomers(limit = 10): Promise<CustomerWithScore[]> {
    const customers = await this.customerRepository
      .createQueryBuilder('customer')
      .leftJoinAndSelect('customer.score', 'score')
      .where('customer.lastTransactionDate IS NOT NULL')
      .orderBy('customer.lastTransactionDate', 'DESC')
      .addOrderBy('customer.id', 'DESC')
      .limit(limit)
      .getMany();

    return customers.map(toView);
  }

  async getCustomersWithScores(): Promise<CustomerWithScore[]> {
    const customers = await this.customerRepository.find({
      relations: { score: true },
      order: { id: 'ASC' },
    });

    return customers
      .map(toView)
      .sort(
        (a, b) => (b.churnProbability ?? -1) - (a.churnProbability ?? -1),
      );
  }

  async getDashboardStats(): Promise<DashboardStats> {
    const [totalCustomers, distribution, revenue, atRisk, activeCampaigns] =
      await Promise.all([
        this.customerRepository.count(),
        this.getChurnDistribution(),
        this.customerRepository
          .createQueryBuilder('customer')
          .select('SUM(customer.totalSpent)', 'total')
          .getRawOne<{ total: NumericRaw }>(),
        this.customerRepository
          .createQueryBuilder('customer')
          .innerJoin('customer.score', 'score')
          .select('SUM(customer.totalSpent)', 'total')
          .where('score.churnProbability >= :threshold', {
            threshold: HIGH_RISK_THRESHOLD,
          })
          .getRawOne<{ total: NumericRaw }>(),
        this.campaignRepository.count({ where: { status: 'active' } }),
      ]);

    const countFor = (level: RiskLevel): number =>
      distribution.find((entry) => entry.riskLevel === level)?.count ?? 0;

    return {
      totalCustomers,
      highRiskCount: countFor(RiskLevel.HIGH),
      mediumRiskCount: countFor(RiskLevel.MEDIUM),
      lowRiskCount: countFor(RiskLevel.LOW),
      totalRevenue: toNumber(revenue?.total),
      atRiskRevenue: toNumber(atRisk?.total),
      activeCampaigns,
    };
  }

  async getChurnDistribution(): Promise<RiskDistributionEntry[]> {
    const rows = await this.scoreRepository
      .createQueryBuilder('score')
      .select('score.riskLevel', 'riskLevel')
      .addSelect('COUNT(score.id)', 'count')
      .groupBy('score.riskLevel')
      .getRawMany<{ riskLevel: string; count: NumericRaw }>();

    return Object.values(RiskLevel).map((riskLevel) => ({
      riskLevel,
      count: toNumber(rows.find((row) => row.riskLevel === riskLevel)?.count),
    }));
  }

  async addCustomers(records: NewCustomer[]): Promise<number> {
    const saved = await this.saveCustomers(records);
    return saved.length;
  }

  async saveCustomers(records: NewCustomer[]): Promise<CustomerRecord[]> {
    const saved: CustomerRecord[] = [];

    for (const record of records) {
      try {
        const customer = await this.customerRepository.save(
          this.customerRepository.create(record),
        );
        saved.push(toRecord(customer));
      } catch (error: unknown) {
        const errorMessage =
          error instanceof Error ? error.message : 'Unknown error';
        this.logger.warn(`Error adding customer: ${errorMessage}`);
      }
    }

    return saved;
  }

  async addChurnScores(results: ScoredCustomer[]): Promise<void> {
    // Last result per customer wins within a batch
    const latest = new Map<number, ScoredCustomer>();
    for (const result of results) {
      if (result.customerId === null) {
        this.logger.warn(
          `Skipping churn score without customer id (${result.email})`,
        );
        continue;
      }
      latest.set(result.customerId, result);
    }
    if (latest.size === 0) return;

    const ids = [...latest.keys()];
    await this.scoreRepository.manager.transaction(async (manager) => {
      for (let i = 0; i < ids.length; i += ID_CHUNK_SIZE) {
        const chunk = ids.slice(i, i + ID_CHUNK_SIZE);
        await manager.delete(ChurnScore, { customerId: In(chunk) });
        await manager.insert(
          ChurnScore,
          chunk.flatMap((customerId) => {
            const result = latest.get(customerId);
            return result
              ? [
                  {
                    customerId,
                    churnProbability: result.churnProbability,
                    riskLevel: result.riskLevel,
                    features: result.features,
                  },
                ]
              : [];
          }),
        );
      }
    });

    this.logger.log(`Stored churn scores for ${ids.length} customers`);
  }
}

function toRecord(customer: Customer): CustomerRecord {
  return {
    id: customer.id,
    name: customer.name,
    email: customer.email,
    phone: customer.phone,
    registrationDate: customer.registrationDate,
    lastTransactionDate: customer.lastTransactionDate,
    transactionCount: customer.transactionCount,
    totalSpent: customer.totalSpent,
    engagementScore: customer.engagementScore,
    supportTickets: customer.supportTickets,
  };
}

function toView(customer: Customer): CustomerWithScore {
  return {
    ...toRecord(customer),
    churnProbability: customer.score?.churnProbability ?? null,
    riskLevel: customer.score?.riskLevel ?? null,
    features: customer.score?.features ?? null,
    scoredAt: customer.score?.scoredAt ?? null,
  };
}

function toNumber(value: NumericRaw): number {
  const parsed = Number(value ?? 0);
  return Number.isFinite(parsed) ? parsed : 0;
}
