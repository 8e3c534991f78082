import { Module } from '@nestjs/common';
import { chatbotMetricsProviders } from '../common/metrics.providers';
import { CustomersModule } from '../customers/customers.module';
import { ChatbotController } from './chatbot.controller';
import { ChatbotService } from './chatbot.service';

@Module({
  imports: [CustomersModule],
  controllers: [ChatbotController],
  providers: [ChatbotService, ...chatbotMetricsProviders],
})
export class ChatbotModule {}
