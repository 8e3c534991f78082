import { BullModule } from '@nestjs/bullmq';
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { campaignMetricsProviders } from '../common/metrics.providers';
import { CustomersModule } from '../customers/customers.module';
import { CampaignEvent } from './campaign-event.entity';
import { Campaign } from './campaign.entity';
import { CampaignProcessor } from './campaign.processor';
import { CampaignsController } from './campaigns.controller';
import {
  CAMPAIGN_DISPATCH_QUEUE,
  CampaignsService,
} from './campaigns.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Campaign, CampaignEvent]),
    BullModule.registerQueue({
      name: CAMPAIGN_DISPATCH_QUEUE,
    }),
    CustomersModule,
  ],
  controllers: [CampaignsController],
  providers: [CampaignsService, CampaignProcessor, ...campaignMetricsProviders],
  exports: [CampaignsService],
})
export class CampaignsModule {}
