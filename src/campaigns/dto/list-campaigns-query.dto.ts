import { IsIn, IsOptional } from 'class-validator';
import type { CampaignStatus } from '../campaign.entity';
import { CAMPAIGN_STATUSES } from '../campaign.entity';

export class ListCampaignsQueryDto {
  @IsOptional()
  @IsIn(CAMPAIGN_STATUSES)
  status?: CampaignStatus;
}
