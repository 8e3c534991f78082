import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { CampaignsService } from './campaigns.service';
import { CreateCampaignDto } from './dto/create-campaign.dto';
import { ListCampaignsQueryDto } from './dto/list-campaigns-query.dto';

@Controller('campaigns')
export class CampaignsController {
  constructor(private readonly campaignsService: CampaignsService) {}

  @Post()
  async create(@Body() body: CreateCampaignDto) {
    const campaign = await this.campaignsService.create(body);
    return {
      success: true,
      campaignId: campaign.id,
      message: 'Campaign created successfully',
    };
  }

  @Get()
  async findAll(@Query() query: ListCampaignsQueryDto) {
    return {
      success: true,
      data: await this.campaignsService.findAll(query.status),
    };
  }

  @Post(':id/execute')
  @HttpCode(HttpStatus.ACCEPTED)
  async execute(@Param('id', ParseIntPipe) id: number) {
    const { campaignId, dispatchId } =
      await this.campaignsService.enqueueExecution(id);
    return {
      success: true,
      message: 'Campaign execution queued',
      campaignId,
      dispatchId,
    };
  }
}
