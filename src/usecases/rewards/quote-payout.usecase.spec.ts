// src/usecases/rewards/quote-payout.usecase.spec.ts
import type { RewardSettings } from '@app-types/models/reward.types';
import { PAYOUT_ERROR } from '@core/common/errors/domain-error';
import type { IntegrationEventEnvelope } from '@core/common/integration-events/events.types';
import { RewardEngine } from '@core/rewards/reward-engine';
import { INTEGRATION_EVENTS_TOKENS } from '@modules/common/integration-events/events.tokens';
import { REWARDS_TOKENS } from '@modules/rewards/rewards.tokens';
import { Test } from '@nestjs/testing';
import { PinoLogger } from 'nestjs-pino';
import { QuotePayoutUsecase } from './quote-payout.usecase';

const settings: RewardSettings = {
  rateTable: { baseRates: { mobile: 0.001 }, multipliers: {} },
  minimumPayoutAmount: 5,
  platformFeePercentage: 10,
  currency: 'usd',
};

describe('QuotePayoutUsecase', () => {
  let usecase: QuotePayoutUsecase;
  let events: IntegrationEventEnvelope[];
  const logger = { setContext: jest.fn(), info: jest.fn(), debug: jest.fn() };

  beforeEach(async () => {
    events = [];
    const outbox = {
      enqueue: jest.fn(async (env: IntegrationEventEnvelope) => {
        await Promise.resolve();
        events.push(env);
      }),
      enqueueMany: jest.fn(),
    };
    const module = await Test.createTestingModule({
      providers: [
        QuotePayoutUsecase,
        { provide: REWARDS_TOKENS.SETTINGS, useValue: settings },
        { provide: REWARDS_TOKENS.ENGINE, useValue: new RewardEngine(settings.rateTable) },
        { provide: INTEGRATION_EVENTS_TOKENS.OUTBOX_WRITER, useValue: outbox },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();
    usecase = module.get(QuotePayoutUsecase);
  });

  it('低于门槛时不可提现且不投递事件', async () => {
    await expect(usecase.execute({ amount: 4.99, currency: 'usd', applyFee: true })).resolves.toEqual({
      eligible: false,
      amount: 4.99,
      minimumPayout: 5,
      currency: 'usd',
    });
    expect(events).toHaveLength(0);
  });

  it('恰好等于门槛时可提现，未要求手续费则不拆分', async () => {
    await expect(usecase.execute({ amount: 5, currency: 'USD' })).resolves.toEqual({
      eligible: true,
      amount: 5,
      minimumPayout: 5,
      currency: 'usd',
    });
    expect(events).toHaveLength(1);
    expect(events[0].payload).toEqual({
      amount: 5,
      currency: 'usd',
      netAmount: null,
      feeAmount: null,
    });
  });

  it('applyFee 时拆分平台手续费', async () => {
    const quote = await usecase.execute({ amount: 100, currency: 'usd', applyFee: true });
    expect(quote).toEqual({
      eligible: true,
      amount: 100,
      minimumPayout: 5,
      currency: 'usd',
      netAmount: 90,
      feeAmount: 10,
    });
    expect(events[0].type).toBe('PayoutQuoted');
    expect(events[0].payload).toEqual({ amount: 100, currency: 'usd', netAmount: 90, feeAmount: 10 });
  });

  it('同一幂等键的重复报价生成相同的 dedupKey', async () => {
    const retry = { amount: 20, currency: 'usd', idempotencyKey: 'wd-1' };
    await usecase.execute({ ...retry, correlationId: 'req-a' });
    await usecase.execute({ ...retry, correlationId: 'req-b' });
    expect(events.map((e) => e.aggregateId)).toEqual(['wd-1', 'wd-1']);
    expect(events.map((e) => e.dedupKey)).toEqual(['PayoutQuoted:wd-1:1', 'PayoutQuoted:wd-1:1']);
    expect(events.map((e) => e.correlationId)).toEqual(['req-a', 'req-b']);
  });

  it('未传幂等键时以请求 ID 作为报价 ID', async () => {
    await usecase.execute({ amount: 20, currency: 'usd', correlationId: 'req-c' });
    expect(events[0].dedupKey).toBe('PayoutQuoted:req-c:1');
  });

  it('幂等键与请求 ID 都缺失时每次生成新的报价 ID', async () => {
    await usecase.execute({ amount: 20, currency: 'usd' });
    await usecase.execute({ amount: 20, currency: 'usd' });
    expect(events[0].aggregateId).not.toBe(events[1].aggregateId);
  });

  it('币种不一致抛出 CURRENCY_MISMATCH', async () => {
    await expect(usecase.execute({ amount: 10, currency: 'eur' })).rejects.toMatchObject({
      code: PAYOUT_ERROR.CURRENCY_MISMATCH,
      details: { expected: 'usd', actual: 'eur' },
    });
  });

  it('负金额抛出 INVALID_AMOUNT', async () => {
    await expect(usecase.execute({ amount: -1, currency: 'usd' })).rejects.toMatchObject({
      code: PAYOUT_ERROR.INVALID_AMOUNT,
    });
  });
});
