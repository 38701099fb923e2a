// src/usecases/rewards/calculate-earnings.usecase.ts
import type { BonusTag, PlatformTag, RewardSettings } from '@app-types/models/reward.types';
import { RewardEngine } from '@core/rewards/reward-engine';
import { REWARDS_TOKENS } from '@modules/rewards/rewards.tokens';
import { Inject, Injectable } from '@nestjs/common';

export interface CalculateEarningsInput {
  readonly score: number;
  readonly platform: PlatformTag;
  readonly bonuses?: ReadonlyArray<BonusTag>;
}

export interface EarningsPreview {
  readonly amount: number;
  /** 本次金额单独提现是否达到门槛 */
  readonly eligibleForPayout: boolean;
}

/**
 * 收益试算（不投递事件，不落账）
 */
@Injectable()
export class CalculateEarningsUsecase {
  constructor(
    @Inject(REWARDS_TOKENS.ENGINE) private readonly engine: RewardEngine,
    @Inject(REWARDS_TOKENS.SETTINGS) private readonly settings: RewardSettings,
  ) {}

  execute(input: CalculateEarningsInput): EarningsPreview {
    const { amount } = this.engine.calculateEarnings(
      input.score,
      input.platform,
      input.bonuses ?? [],
    );
    return {
      amount,
      eligibleForPayout: this.engine.isPayoutEligible(amount, this.settings.minimumPayoutAmount),
    };
  }
}
