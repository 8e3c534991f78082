import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter, Histogram } from 'prom-client';
import {
  CHURN_BATCH_DURATION,
  CHURN_PREDICTIONS_TOTAL,
} from '../common/metrics.providers';
import { extractFeatures } from './feature-extractor';
import { CHURN_SCORER } from './interfaces/churn.interface';
import type {
  ChurnInput,
  ChurnReason,
  ChurnScorer,
  ScoredCustomer,
} from './interfaces/churn.interface';
import { explainChurnRisk } from './scorers/rule-based.scorer';

@Injectable()
export class ChurnPredictorService {
  private readonly logger = new Logger(ChurnPredictorService.name);

  constructor(
    @Inject(CHURN_SCORER) private readonly scorer: ChurnScorer,
    @Optional()
    @InjectMetric(CHURN_PREDICTIONS_TOTAL)
    private readonly predictionsCounter?: Counter<string>,
    @Optional()
    @InjectMetric(CHURN_BATCH_DURATION)
    private readonly batchDuration?: Histogram<string>,
  ) {}

  get scorerName(): string {
    return this.scorer.name;
  }

  predictOne(record: ChurnInput, now: Date = new Date()): ScoredCustomer {
    const features = extractFeatures(record, now);
    const prediction = this.scorer.score(features);

    this.predictionsCounter?.inc({
      risk_level: prediction.riskLevel,
      scorer: this.scorer.name,
    });

    return {
      customerId: record.id ?? null,
      customerName: record.name || 'Unknown',
      email: record.email ?? '',
      ...prediction,
      features,
      scoredAt: now,
    };
  }

  /**
   * Score every record. Output order matches input order; extraction and
   * scoring are total, so every record yields a result.
   */
  predictAll(records: ChurnInput[], now: Date = new Date()): ScoredCustomer[] {
    const stopTimer = this.batchDuration?.startTimer();
    const results = records.map((record) => this.predictOne(record, now));
    stopTimer?.();

    this.logger.log(
      `Scored ${results.length} customers with ${this.scorer.name} scorer`,
    );
    return results;
  }

  explain(record: ChurnInput, now: Date = new Date()): ChurnReason[] {
    return explainChurnRisk(extractFeatures(record, now));
  }
}
