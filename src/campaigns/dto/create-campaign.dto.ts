import {
  ArrayMinSize,
  IsArray,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import type { CampaignChannel, CampaignSegment } from '../campaign.entity';
import { CAMPAIGN_CHANNELS, CAMPAIGN_SEGMENTS } from '../campaign.entity';

export class CreateCampaignDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  name!: string;

  @IsOptional()
  @IsIn(CAMPAIGN_SEGMENTS)
  targetSegment?: CampaignSegment;

  @IsOptional()
  @IsArray()
  @ArrayMinSize(1)
  @IsIn(CAMPAIGN_CHANNELS, { each: true })
  channels?: CampaignChannel[];

  @IsOptional()
  @IsString()
  messageTemplate?: string;
}
