// src/app.module.ts

import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { GraphQLAdapterModule } from './adapters/graphql/graphql-adapter.module';
import { GqlAllExceptionsFilter } from './core/common/filters/graphql-exception.filter';
import { AppConfigModule } from './core/config/config.module';
import { AppGraphQLModule } from './core/graphql/graphql.module';
import { LoggerModule } from './core/logger/logger.module';
import { IntegrationEventsModule } from './modules/common/integration-events/integration-events.module';
import { RewardsModule } from './modules/rewards/rewards.module';

@Module({
  imports: [
    AppConfigModule,
    LoggerModule,
    AppGraphQLModule,
    // 费率表校验失败会在此处中止启动
    RewardsModule,
    // 集成事件模块（内存 Outbox + 调度器）
    IntegrationEventsModule,
    GraphQLAdapterModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: GqlAllExceptionsFilter,
    },
  ],
})
export class AppModule {}
