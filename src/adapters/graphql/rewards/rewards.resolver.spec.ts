// src/adapters/graphql/rewards/rewards.resolver.spec.ts
import type { RewardSettings } from '@app-types/models/reward.types';
import { Test } from '@nestjs/testing';
import { CalculateEarningsUsecase } from '@usecases/rewards/calculate-earnings.usecase';
import { GetRewardSettingsUsecase } from '@usecases/rewards/get-reward-settings.usecase';
import { QuotePayoutUsecase } from '@usecases/rewards/quote-payout.usecase';
import { SettleGameSessionUsecase } from '@usecases/rewards/settle-game-session.usecase';
import { RewardsResolver } from './rewards.resolver';

describe('RewardsResolver', () => {
  let resolver: RewardsResolver;
  const settings: RewardSettings = {
    rateTable: { baseRates: { mobile: 0.001 }, multipliers: { daily_bonus: 1.5 } },
    minimumPayoutAmount: 5,
    platformFeePercentage: 10,
    currency: 'usd',
  };
  const settle = { execute: jest.fn() };
  const quote = { execute: jest.fn() };
  const calculate = { execute: jest.fn() };

  beforeEach(async () => {
    const module = await Test.createTestingModule({
      providers: [
        RewardsResolver,
        { provide: GetRewardSettingsUsecase, useValue: { execute: () => settings } },
        { provide: CalculateEarningsUsecase, useValue: calculate },
        { provide: SettleGameSessionUsecase, useValue: settle },
        { provide: QuotePayoutUsecase, useValue: quote },
      ],
    }).compile();
    resolver = module.get(RewardsResolver);
  });

  it('rewardSettings 展开费率表', () => {
    expect(resolver.rewardSettings()).toEqual({
      baseRates: { mobile: 0.001 },
      multipliers: { daily_bonus: 1.5 },
      minimumPayoutAmount: 5,
      platformFeePercentage: 10,
      currency: 'usd',
    });
  });

  it('settleGameSession 透传关联 ID', async () => {
    settle.execute.mockResolvedValue({ gameId: 'g-1', amount: 1.5, currency: 'usd' });
    await expect(
      resolver.settleGameSession(
        { gameId: 'g-1', platform: 'mobile', finalScore: 1000, duration: 60, bonuses: ['daily_bonus'] },
        'req-1',
      ),
    ).resolves.toEqual({ gameId: 'g-1', amount: 1.5, currency: 'usd' });
    expect(settle.execute).toHaveBeenCalledWith({
      gameId: 'g-1',
      platform: 'mobile',
      finalScore: 1000,
      duration: 60,
      bonuses: ['daily_bonus'],
      correlationId: 'req-1',
    });
  });

  it('quotePayout 未传 applyFee 时按 false 处理', async () => {
    quote.execute.mockResolvedValue({ eligible: false, amount: 1, minimumPayout: 5, currency: 'usd' });
    await resolver.quotePayout({ amount: 1, currency: 'usd' });
    expect(quote.execute).toHaveBeenCalledWith({
      amount: 1,
      currency: 'usd',
      applyFee: false,
      correlationId: undefined,
    });
  });

  it('quotePayout 透传幂等键与请求 ID', async () => {
    quote.execute.mockResolvedValue({ eligible: true, amount: 20, minimumPayout: 5, currency: 'usd' });
    await resolver.quotePayout(
      { amount: 20, currency: 'USD', applyFee: true, idempotencyKey: 'wd-0042' },
      'req-77',
    );
    expect(quote.execute).toHaveBeenCalledWith({
      amount: 20,
      currency: 'USD',
      applyFee: true,
      idempotencyKey: 'wd-0042',
      correlationId: 'req-77',
    });
  });

  it('calculateEarnings 调用试算用例', () => {
    calculate.execute.mockReturnValue({ amount: 0.9872, eligibleForPayout: false });
    expect(resolver.calculateEarnings({ score: 1234, platform: 'web' })).toEqual({
      amount: 0.9872,
      eligibleForPayout: false,
    });
    expect(calculate.execute).toHaveBeenCalledWith({ score: 1234, platform: 'web', bonuses: undefined });
  });
});
