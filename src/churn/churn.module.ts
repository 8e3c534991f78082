import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { churnMetricsProviders } from '../common/metrics.providers';
import { ChurnPredictorService } from './churn-predictor.service';
import { CHURN_SCORER } from './interfaces/churn.interface';
import { createChurnScorer } from './scorers/scorer.factory';

@Module({
  imports: [ConfigModule],
  providers: [
    ChurnPredictorService,
    {
      provide: CHURN_SCORER,
      useFactory: (configService: ConfigService) =>
        createChurnScorer(configService.get<string>('CHURN_MODEL_PATH')),
      inject: [ConfigService],
    },
    ...churnMetricsProviders,
  ],
  exports: [ChurnPredictorService],
})
export class ChurnModule {}
