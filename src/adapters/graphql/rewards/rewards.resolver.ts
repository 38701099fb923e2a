// src/adapters/graphql/rewards/rewards.resolver.ts
import { ValidateInput } from '@core/common/errors/validate-input.decorator';
import { Args, Mutation, Query, Resolver } from '@nestjs/graphql';
import { correlationId } from '@src/adapters/graphql/decorators/correlation-id.decorator';
import { CalculateEarningsUsecase } from '@usecases/rewards/calculate-earnings.usecase';
import { GetRewardSettingsUsecase } from '@usecases/rewards/get-reward-settings.usecase';
import { QuotePayoutUsecase } from '@usecases/rewards/quote-payout.usecase';
import { SettleGameSessionUsecase } from '@usecases/rewards/settle-game-session.usecase';
import {
  EarningsResultType,
  PayoutQuoteType,
  RewardSettingsType,
  SessionEarningsType,
} from './dto/rewards.dto';
import { CalculateEarningsInput, QuotePayoutInput, SettleGameSessionInput } from './dto/rewards.input';

/**
 * 奖励 GraphQL 解析器
 * - 仅做 DTO 映射与 Usecase 调用
 */
@Resolver()
export class RewardsResolver {
  constructor(
    private readonly getSettingsUsecase: GetRewardSettingsUsecase,
    private readonly calculateUsecase: CalculateEarningsUsecase,
    private readonly settleUsecase: SettleGameSessionUsecase,
    private readonly quoteUsecase: QuotePayoutUsecase,
  ) {}

  @Query(() => RewardSettingsType, { description: '当前生效的奖励设置' })
  rewardSettings(): RewardSettingsType {
    const settings = this.getSettingsUsecase.execute();
    return {
      baseRates: { ...settings.rateTable.baseRates },
      multipliers: { ...settings.rateTable.multipliers },
      minimumPayoutAmount: settings.minimumPayoutAmount,
      platformFeePercentage: settings.platformFeePercentage,
      currency: settings.currency,
    };
  }

  @Query(() => EarningsResultType, { description: '收益试算（不结算）' })
  @ValidateInput()
  calculateEarnings(@Args('input') input: CalculateEarningsInput): EarningsResultType {
    return this.calculateUsecase.execute({
      score: input.score,
      platform: input.platform,
      bonuses: input.bonuses,
    });
  }

  @Mutation(() => SessionEarningsType, { description: '结算一局游戏的收益' })
  @ValidateInput()
  async settleGameSession(
    @Args('input') input: SettleGameSessionInput,
    @correlationId() requestId?: string,
  ): Promise<SessionEarningsType> {
    return this.settleUsecase.execute({
      gameId: input.gameId,
      platform: input.platform,
      finalScore: input.finalScore,
      duration: input.duration,
      bonuses: input.bonuses,
      correlationId: requestId,
    });
  }

  @Mutation(() => PayoutQuoteType, { description: '提现报价（门槛与手续费），达标时投递打款事件' })
  @ValidateInput()
  async quotePayout(
    @Args('input') input: QuotePayoutInput,
    @correlationId() requestId?: string,
  ): Promise<PayoutQuoteType> {
    return this.quoteUsecase.execute({
      amount: input.amount,
      currency: input.currency,
      applyFee: input.applyFee ?? false,
      idempotencyKey: input.idempotencyKey,
      correlationId: requestId,
    });
  }
}
