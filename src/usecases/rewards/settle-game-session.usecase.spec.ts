// src/usecases/rewards/settle-game-session.usecase.spec.ts
import type { RewardSettings } from '@app-types/models/reward.types';
import { REWARD_ERROR, SESSION_ERROR } from '@core/common/errors/domain-error';
import type { IntegrationEventEnvelope } from '@core/common/integration-events/events.types';
import type { IOutboxWriterPort } from '@core/common/integration-events/outbox.port';
import { RewardEngine } from '@core/rewards/reward-engine';
import { INTEGRATION_EVENTS_TOKENS } from '@modules/common/integration-events/events.tokens';
import { REWARDS_TOKENS } from '@modules/rewards/rewards.tokens';
import { Test } from '@nestjs/testing';
import { PinoLogger } from 'nestjs-pino';
import { SettleGameSessionUsecase } from './settle-game-session.usecase';

class FakeOutbox implements IOutboxWriterPort {
  readonly events: IntegrationEventEnvelope[] = [];

  async enqueue(envelope: IntegrationEventEnvelope): Promise<void> {
    await this.enqueueMany([envelope]);
  }

  async enqueueMany(envelopes: ReadonlyArray<IntegrationEventEnvelope>): Promise<void> {
    await Promise.resolve();
    this.events.push(...envelopes);
  }
}

const settings: RewardSettings = {
  rateTable: {
    baseRates: { mobile: 0.001, web: 0.0008 },
    multipliers: { daily_bonus: 1.5, streak_bonus: 1.25 },
  },
  minimumPayoutAmount: 5,
  platformFeePercentage: 10,
  currency: 'usd',
};

describe('SettleGameSessionUsecase', () => {
  let usecase: SettleGameSessionUsecase;
  let outbox: FakeOutbox;
  const logger = { setContext: jest.fn(), info: jest.fn(), debug: jest.fn() };

  beforeEach(async () => {
    outbox = new FakeOutbox();
    const module = await Test.createTestingModule({
      providers: [
        SettleGameSessionUsecase,
        { provide: REWARDS_TOKENS.SETTINGS, useValue: settings },
        { provide: REWARDS_TOKENS.ENGINE, useValue: new RewardEngine(settings.rateTable) },
        { provide: INTEGRATION_EVENTS_TOKENS.OUTBOX_WRITER, useValue: outbox },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();
    usecase = module.get(SettleGameSessionUsecase);
  });

  it('计算收益并投递 GameSessionSettled 事件', async () => {
    const result = await usecase.execute({
      gameId: ' match-1 ',
      platform: 'mobile',
      finalScore: 1000,
      duration: 320,
      bonuses: ['daily_bonus', ' '],
      correlationId: 'req-7',
    });

    expect(result).toEqual({ gameId: 'match-1', amount: 1.5, currency: 'usd' });
    expect(outbox.events).toHaveLength(1);
    const [event] = outbox.events;
    expect(event.type).toBe('GameSessionSettled');
    expect(event.aggregateId).toBe('match-1');
    expect(String(event.dedupKey)).toBe('GameSessionSettled:match-1:1');
    expect(event.correlationId).toBe('req-7');
    expect(event.payload).toEqual({
      gameId: 'match-1',
      platform: 'mobile',
      finalScore: 1000,
      duration: 320,
      bonuses: ['daily_bonus'],
      amount: 1.5,
      currency: 'usd',
    });
    expect(logger.info).toHaveBeenCalledWith(
      { gameId: 'match-1', platform: 'mobile', score: 1000, amount: 1.5 },
      'Game session settled',
    );
  });

  it('空 gameId 抛出 INVALID_SESSION', async () => {
    await expect(
      usecase.execute({ gameId: '  ', platform: 'web', finalScore: 10, duration: 5 }),
    ).rejects.toMatchObject({ code: SESSION_ERROR.INVALID_SESSION });
    expect(outbox.events).toHaveLength(0);
  });

  it('负时长抛出 INVALID_SESSION', async () => {
    await expect(
      usecase.execute({ gameId: 'g', platform: 'web', finalScore: 10, duration: -1 }),
    ).rejects.toMatchObject({ code: SESSION_ERROR.INVALID_SESSION });
  });

  it('未知平台透传引擎错误且不投递事件', async () => {
    await expect(
      usecase.execute({ gameId: 'g', platform: 'arcade', finalScore: 10, duration: 1 }),
    ).rejects.toMatchObject({ code: REWARD_ERROR.UNKNOWN_PLATFORM });
    expect(outbox.events).toHaveLength(0);
  });
});
