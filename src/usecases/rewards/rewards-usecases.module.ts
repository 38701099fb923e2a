// src/usecases/rewards/rewards-usecases.module.ts
import { IntegrationEventsModule } from '@modules/common/integration-events/integration-events.module';
import { RewardsModule } from '@modules/rewards/rewards.module';
import { Module } from '@nestjs/common';
import { CalculateEarningsUsecase } from './calculate-earnings.usecase';
import { GetRewardSettingsUsecase } from './get-reward-settings.usecase';
import { QuotePayoutUsecase } from './quote-payout.usecase';
import { SettleGameSessionUsecase } from './settle-game-session.usecase';

@Module({
  imports: [RewardsModule, IntegrationEventsModule],
  providers: [
    SettleGameSessionUsecase,
    QuotePayoutUsecase,
    GetRewardSettingsUsecase,
    CalculateEarningsUsecase,
  ],
  exports: [
    SettleGameSessionUsecase,
    QuotePayoutUsecase,
    GetRewardSettingsUsecase,
    CalculateEarningsUsecase,
  ],
})
export class RewardsUsecasesModule {}
