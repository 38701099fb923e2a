// src/modules/rewards/rewards.module.ts
// 启动时校验奖励配置并构造只读的 RewardEngine，配置非法则中止初始化

import type { RewardSettings } from '@app-types/models/reward.types';
import { RewardEngine } from '@core/rewards/reward-engine';
import { parseRewardSettings, type RawRewardSettings } from '@core/rewards/reward-settings';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { REWARDS_TOKENS } from './rewards.tokens';

@Module({
  providers: [
    {
      provide: REWARDS_TOKENS.SETTINGS,
      inject: [ConfigService],
      useFactory: (config: ConfigService): RewardSettings => {
        const raw = config.get<RawRewardSettings>('rewards');
        if (!raw) {
          throw new Error('rewards config is not loaded');
        }
        return parseRewardSettings(raw);
      },
    },
    {
      provide: REWARDS_TOKENS.ENGINE,
      inject: [REWARDS_TOKENS.SETTINGS],
      useFactory: (settings: RewardSettings) => new RewardEngine(settings.rateTable),
    },
  ],
  exports: [REWARDS_TOKENS.SETTINGS, REWARDS_TOKENS.ENGINE],
})
export class RewardsModule {}
