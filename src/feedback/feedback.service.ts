import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CUSTOMER_STORE } from '../customers/interfaces/customer-store.interface';
import type { CustomerStore } from '../customers/interfaces/customer-store.interface';
import { CreateFeedbackDto } from './dto/create-feedback.dto';
import { Feedback } from './feedback.entity';
import { analyzeSentiment } from './sentiment.analyzer';
import type { Sentiment } from './sentiment.analyzer';

export interface FeedbackView {
  id: number;
  customerId: number;
  customerName: string | null;
  feedbackText: string;
  sentiment: Sentiment;
  sentimentScore: number;
  source: string;
  createdAt: Date;
}

@Injectable()
export class FeedbackService {
  private readonly logger = new Logger(FeedbackService.name);

  constructor(
    @InjectRepository(Feedback)
    private readonly feedbackRepository: Repository<Feedback>,
    @Inject(CUSTOMER_STORE) private readonly store: CustomerStore,
  ) {}

  async add(dto: CreateFeedbackDto): Promise<Feedback> {
    const customer = await this.store.getCustomerDetail(dto.customerId);
    if (!customer) {
      throw new NotFoundException(
        `Customer with ID ${dto.customerId} not found`,
      );
    }

    const { sentiment, score } = analyzeSentiment(dto.feedbackText);
    const saved = await this.feedbackRepository.save(
      this.feedbackRepository.create({
        customerId: dto.customerId,
        feedbackText: dto.feedbackText,
        sentiment,
        sentimentScore: score,
        source: dto.source ?? 'manual',
      }),
    );

    this.logger.log(
      `Recorded ${sentiment} feedback ${saved.id} for customer ${dto.customerId}`,
    );
    return saved;
  }

  async recent(limit = 10): Promise<FeedbackView[]> {
    const rows = await this.feedbackRepository.find({
      relations: { customer: true },
      order: { createdAt: 'DESC', id: 'DESC' },
      take: limit,
    });

    return rows.map((row) => ({
      id: row.id,
      customerId: row.customerId,
      customerName: row.customer?.name ?? null,
      feedbackText: row.feedbackText,
      sentiment: row.sentiment,
      sentimentScore: row.sentimentScore,
      source: row.source,
      createdAt: row.createdAt,
    }));
  }
}
