// src/adapters/graphql/graphql-adapter.module.ts

import { Module } from '@nestjs/common';
import { RewardsUsecasesModule } from '@usecases/rewards/rewards-usecases.module';

// Resolvers
import { RewardsResolver } from './rewards/rewards.resolver';

/**
 * GraphQL 适配器模块
 * 只注册解析器，业务由 usecases 层提供
 */
@Module({
  imports: [RewardsUsecasesModule],
  providers: [RewardsResolver],
})
export class GraphQLAdapterModule {}
