import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { BullModule } from '@nestjs/bullmq';
import { CampaignsModule } from './campaigns/campaigns.module';
import { ChatbotModule } from './chatbot/chatbot.module';
import { validateEnv } from './config/env.validation';
import { CustomersModule } from './customers/customers.module';
import { DashboardModule } from './dashboard/dashboard.module';
import { FeedbackModule } from './feedback/feedback.module';

export function typeOrmOptions(
  configService: ConfigService,
): TypeOrmModuleOptions {
  const common = {
    autoLoadEntities: true,
    synchronize: true, // Only for development
  };

  if (configService.get<string>('DB_TYPE') === 'better-sqlite3') {
    return {
      ...common,
      type: 'better-sqlite3',
      database: configService.get<string>('DATABASE_PATH', 'churn.sqlite'),
    };
  }

  return {
    ...common,
    type: 'postgres',
    url: configService.get<string>('DATABASE_URL'),
  };
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    LoggerModule.forRoot({
      pinoHttp: {
        transport:
          process.env.NODE_ENV !== 'production'
            ? { target: 'pino-pretty', options: { colorize: true } }
            : undefined,
        redact: [
          '[*].email',
          '[*].phone',
          'req.body.customers[*].email',
          'req.body.customers[*].phone',
        ],
      },
    }),
    PrometheusModule.register({
      path: '/metrics',
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: typeOrmOptions,
      inject: [ConfigService],
    }),
    BullModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        connection: {
          host: configService.get<string>('REDIS_HOST'),
          port: configService.get<number>('REDIS_PORT'),
        },
      }),
      inject: [ConfigService],
    }),
    CustomersModule,
    ChatbotModule,
    CampaignsModule,
    FeedbackModule,
    DashboardModule,
  ],
})
export class AppModule {}
