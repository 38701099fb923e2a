// src/core/graphql/graphql.module.ts

import { ApolloServerPluginLandingPageLocalDefault } from '@apollo/server/plugin/landingPage/default';
import { ApolloDriver, ApolloDriverConfig } from '@nestjs/apollo';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GraphQLModule } from '@nestjs/graphql';
import { IncomingMessage } from 'http';

/**
 * GraphQL 配置工厂函数
 * 请求对象放进上下文，供 correlationId 装饰器读取 pino-http 生成的请求 ID
 * @param config 配置服务实例
 */
const createGraphQLConfig = (config: ConfigService): ApolloDriverConfig => ({
  path: config.get<string>('graphql.path', '/graphql'),
  autoSchemaFile: config.get<string | boolean>('graphql.schemaDestination', true),
  introspection: config.get<boolean>('graphql.introspection', true),
  playground: false,
  sortSchema: config.get<boolean>('graphql.sortSchema', true),
  context: ({ req }: { req: IncomingMessage }) => ({ req }),
  plugins: [ApolloServerPluginLandingPageLocalDefault()],
});

/**
 * GraphQL 模块（Apollo 驱动，code-first，无订阅）
 */
@Module({
  imports: [
    GraphQLModule.forRootAsync<ApolloDriverConfig>({
      driver: ApolloDriver,
      inject: [ConfigService],
      useFactory: createGraphQLConfig,
    }),
  ],
  exports: [GraphQLModule],
})
export class AppGraphQLModule {}
