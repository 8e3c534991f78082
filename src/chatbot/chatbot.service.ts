import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter } from 'prom-client';
import { CHATBOT_QUERIES_TOTAL } from '../common/metrics.providers';
import { CUSTOMER_STORE } from '../customers/interfaces/customer-store.interface';
import type { CustomerStore } from '../customers/interfaces/customer-store.interface';
import { classifyIntent } from './intent-matcher';
import type { ChatResponse } from './interfaces/chat-response.interface';
import { generateResponse } from './response-generator';

@Injectable()
export class ChatbotService {
  private readonly logger = new Logger(ChatbotService.name);

  constructor(
    @Inject(CUSTOMER_STORE) private readonly store: CustomerStore,
    @Optional()
    @InjectMetric(CHATBOT_QUERIES_TOTAL)
    private readonly queriesCounter?: Counter<string>,
  ) {}

  async classifyAndRespond(message: string): Promise<ChatResponse> {
    const intent = classifyIntent(message);
    this.logger.log(`Chat message classified as ${intent}`);
    this.queriesCounter?.inc({ intent });

    return generateResponse(intent, message, this.store);
  }
}
