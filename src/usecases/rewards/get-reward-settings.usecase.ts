// src/usecases/rewards/get-reward-settings.usecase.ts
import type { RewardSettings } from '@app-types/models/reward.types';
import { REWARDS_TOKENS } from '@modules/rewards/rewards.tokens';
import { Inject, Injectable } from '@nestjs/common';

/**
 * 读取当前生效的奖励设置（只读视图）
 */
@Injectable()
export class GetRewardSettingsUsecase {
  constructor(@Inject(REWARDS_TOKENS.SETTINGS) private readonly settings: RewardSettings) {}

  execute(): RewardSettings {
    return this.settings;
  }
}
