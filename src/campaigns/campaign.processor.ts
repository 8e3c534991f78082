import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { Job } from 'bullmq';
import {
  CAMPAIGN_DISPATCH_QUEUE,
  CampaignsService,
} from './campaigns.service';
import type {
  CampaignDispatchJobData,
  CampaignDispatchResult,
} from './campaigns.service';

@Processor(CAMPAIGN_DISPATCH_QUEUE)
export class CampaignProcessor extends WorkerHost {
  private readonly logger = new Logger(CampaignProcessor.name);

  constructor(private readonly campaignsService: CampaignsService) {
    super();
  }

  async process(
    job: Job<CampaignDispatchJobData, CampaignDispatchResult, string>,
  ): Promise<CampaignDispatchResult> {
    const { campaignId, dispatchId } = job.data;
    this.logger.log(
      `Dispatching campaign ${campaignId} (attempt ${job.attemptsMade + 1})`,
    );

    try {
      return await this.campaignsService.dispatch(campaignId, dispatchId);
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `Campaign dispatch ${dispatchId} failed: ${errorMessage}`,
      );
      throw error;
    }
  }
}
