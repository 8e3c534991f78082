import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Campaign } from '../campaigns/campaign.entity';
import { ChurnModule } from '../churn/churn.module';
import { ChurnScore } from './churn-score.entity';
import { Customer } from './customer.entity';
import { CustomersController } from './customers.controller';
import { CustomersService } from './customers.service';
import { CUSTOMER_STORE } from './interfaces/customer-store.interface';
import { TypeOrmCustomerStore } from './typeorm-customer.store';

@Module({
  imports: [
    TypeOrmModule.forFeature([Customer, ChurnScore, Campaign]),
    ChurnModule,
  ],
  controllers: [CustomersController],
  providers: [
    CustomersService,
    {
      provide: CUSTOMER_STORE,
      useClass: TypeOrmCustomerStore,
    },
  ],
  exports: [CustomersService, CUSTOMER_STORE],
})
export class CustomersModule {}
