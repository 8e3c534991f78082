import {
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectQueue } from '@nestjs/bullmq';
import { InjectRepository } from '@nestjs/typeorm';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Queue } from 'bullmq';
import { Counter } from 'prom-client';
import { Repository } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import {
  HIGH_RISK_THRESHOLD,
  MEDIUM_RISK_THRESHOLD,
  RiskLevel,
} from '../churn/interfaces/churn.interface';
import { CAMPAIGN_EVENTS_TOTAL } from '../common/metrics.providers';
import { CUSTOMER_STORE } from '../customers/interfaces/customer-store.interface';
import type {
  CustomerStore,
  HighRiskCustomer,
} from '../customers/interfaces/customer-store.interface';
import { CampaignEvent } from './campaign-event.entity';
import { Campaign } from './campaign.entity';
import type { CampaignSegment, CampaignStatus } from './campaign.entity';
import { CreateCampaignDto } from './dto/create-campaign.dto';

export const CAMPAIGN_DISPATCH_QUEUE = 'campaign-dispatch';
export const DEFAULT_MAX_RECIPIENTS = 10;

export interface CampaignDispatchJobData {
  campaignId: number;
  dispatchId: string;
}

export interface CampaignDispatchResult {
  campaignId: number;
  dispatchId: string;
  recipients: number;
  eventsCreated: number;
}

@Injectable()
export class CampaignsService {
  private readonly logger = new Logger(CampaignsService.name);

  constructor(
    @InjectRepository(Campaign)
    private readonly campaignRepository: Repository<Campaign>,
    @InjectRepository(CampaignEvent)
    private readonly eventRepository: Repository<CampaignEvent>,
    @Inject(CUSTOMER_STORE) private readonly store: CustomerStore,
    @InjectQueue(CAMPAIGN_DISPATCH_QUEUE)
    private readonly dispatchQueue: Queue<CampaignDispatchJobData>,
    private readonly configService: ConfigService,
    @Optional()
    @InjectMetric(CAMPAIGN_EVENTS_TOTAL)
    private readonly eventsCounter?: Counter<string>,
  ) {}

  async create(dto: CreateCampaignDto): Promise<Campaign> {
    const campaign = this.campaignRepository.create({
      name: dto.name,
      targetSegment: dto.targetSegment ?? 'high_risk',
      channels: dto.channels ?? ['email'],
      messageTemplate: dto.messageTemplate ?? '',
      status: 'active',
    });
    const saved = await this.campaignRepository.save(campaign);
    this.logger.log(`Created campaign ${saved.id} (${saved.targetSegment})`);
    return saved;
  }

  async findAll(status: CampaignStatus = 'active'): Promise<Campaign[]> {
    return this.campaignRepository.find({
      where: { status },
      order: { createdAt: 'DESC', id: 'DESC' },
    });
  }

  async findOne(id: number): Promise<Campaign> {
    const campaign = await this.campaignRepository.findOne({ where: { id } });
    if (!campaign) {
      throw new NotFoundException(`Campaign with ID ${id} not found`);
    }
    return campaign;
  }

  /** Queue a dispatch run; the worker creates the events */
  async enqueueExecution(id: number): Promise<CampaignDispatchJobData> {
    const campaign = await this.findOne(id);
    const data: CampaignDispatchJobData = {
      campaignId: campaign.id,
      dispatchId: uuidv4(),
    };

    await this.dispatchQueue.add('execute-campaign', data, {
      attempts: 3,
      backoff: {
        type: 'exponential',
        delay: 1000,
      },
    });

    this.logger.log(
      `Queued dispatch ${data.dispatchId} for campaign ${campaign.id}`,
    );
    return data;
  }

  /**
   * Create one sent event per target customer and channel. A retried job
   * reuses its dispatch id, so a run that already stored events is not
   * repeated.
   */
  async dispatch(
    campaignId: number,
    dispatchId: string,
  ): Promise<CampaignDispatchResult> {
    const campaign = await this.campaignRepository.findOne({
      where: { id: campaignId },
    });
    if (!campaign) {
      throw new Error(`Campaign with ID ${campaignId} not found`);
    }

    const delivered = await this.eventRepository.find({
      where: { dispatchId },
      select: { customerId: true },
    });
    if (delivered.length > 0) {
      this.logger.warn(`Dispatch ${dispatchId} already delivered, skipping`);
      return {
        campaignId,
        dispatchId,
        recipients: new Set(delivered.map((event) => event.customerId)).size,
        eventsCreated: 0,
      };
    }

    const recipients = await this.findTargets(campaign.targetSegment);
    const sentAt = new Date();
    const events = recipients.flatMap((customer) =>
      campaign.channels.map((channel) =>
        this.eventRepository.create({
          campaignId,
          customerId: customer.id,
          channel,
          status: 'sent',
          sentAt,
          dispatchId,
        }),
      ),
    );
    await this.eventRepository.save(events);

    for (const event of events) {
      this.eventsCounter?.inc({ channel: event.channel, status: event.status });
    }
    this.logger.log(
      `Campaign ${campaignId} sent to ${recipients.length} customers (${events.length} events)`,
    );

    return {
      campaignId,
      dispatchId,
      recipients: recipients.length,
      eventsCreated: events.length,
    };
  }

  private async findTargets(
    segment: CampaignSegment,
  ): Promise<HighRiskCustomer[]> {
    const limit = this.configService.get<number>(
      'CAMPAIGN_MAX_RECIPIENTS',
      DEFAULT_MAX_RECIPIENTS,
    );

    const targets =
      segment === 'high_risk'
        ? await this.store.getHighRiskCustomers(HIGH_RISK_THRESHOLD)
        : (await this.store.getHighRiskCustomers(MEDIUM_RISK_THRESHOLD)).filter(
            (customer) => customer.riskLevel === RiskLevel.MEDIUM,
          );

    return targets.slice(0, limit);
  }
}
