import { Module } from '@nestjs/common';
import { CustomersModule } from '../customers/customers.module';
import { FeedbackModule } from '../feedback/feedback.module';
import { DashboardController } from './dashboard.controller';
import { DashboardService } from './dashboard.service';

@Module({
  imports: [CustomersModule, FeedbackModule],
  controllers: [DashboardController],
  providers: [DashboardService],
})
export class DashboardModule {}
