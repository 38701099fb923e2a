// src/core/config/config.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import graphqlConfig from './graphql.config';
import integrationEventsConfig from './integration-events.config';
import loggerConfig from './logger.config';
import rewardsConfig from './rewards.config';
import serverConfig from './server.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true, // 使 ConfigService 全局可用（无需再次 import）
      envFilePath: [
        `env/.env.${process.env.NODE_ENV || 'development'}`,
        'env/.env.development', // 备用文件
      ],
      // 每个关注点一个命名空间：server / logger / graphql / rewards / integrationEvents
      load: [serverConfig, loggerConfig, graphqlConfig, rewardsConfig, integrationEventsConfig],
    }),
  ],
})
export class AppConfigModule {}
