// src/usecases/rewards/settle-game-session.usecase.ts
import type { BonusTag, PlatformTag, RewardSettings } from '@app-types/models/reward.types';
import { DomainError, SESSION_ERROR } from '@core/common/errors/domain-error';
import { buildEnvelope } from '@core/common/integration-events/events.types';
import type { IOutboxWriterPort } from '@core/common/integration-events/outbox.port';
import { RewardEngine } from '@core/rewards/reward-engine';
import { INTEGRATION_EVENTS_TOKENS } from '@modules/common/integration-events/events.tokens';
import { REWARDS_TOKENS } from '@modules/rewards/rewards.tokens';
import { Inject, Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';

export interface SettleGameSessionInput {
  readonly gameId: string;
  readonly platform: PlatformTag;
  readonly finalScore: number;
  /** 会话时长（秒） */
  readonly duration: number;
  readonly bonuses?: ReadonlyArray<BonusTag>;
  readonly correlationId?: string;
}

export interface SessionEarnings {
  readonly gameId: string;
  readonly amount: number;
  readonly currency: string;
}

/**
 * 游戏会话结算用例
 *
 * 会话结束时由游戏客户端上报分数，计算收益并投递 GameSessionSettled 给外部账本。
 * 同一 gameId 重复上报时事件按 dedupKey 去重，但仍返回计算结果。
 */
@Injectable()
export class SettleGameSessionUsecase {
  constructor(
    @Inject(REWARDS_TOKENS.ENGINE) private readonly engine: RewardEngine,
    @Inject(REWARDS_TOKENS.SETTINGS) private readonly settings: RewardSettings,
    @Inject(INTEGRATION_EVENTS_TOKENS.OUTBOX_WRITER) private readonly outbox: IOutboxWriterPort,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(SettleGameSessionUsecase.name);
  }

  async execute(input: SettleGameSessionInput): Promise<SessionEarnings> {
    const session = this.normalize(input);
    const { amount } = this.engine.calculateEarnings(
      session.finalScore,
      session.platform,
      session.bonuses,
    );
    const currency = this.settings.currency;

    await this.outbox.enqueue(
      buildEnvelope({
        type: 'GameSessionSettled',
        aggregateType: 'game_session',
        aggregateId: session.gameId,
        payload: {
          gameId: session.gameId,
          platform: session.platform,
          finalScore: session.finalScore,
          duration: session.duration,
          bonuses: [...session.bonuses],
          amount,
          currency,
        },
        correlationId: input.correlationId,
      }),
    );

    this.logger.info(
      { gameId: session.gameId, platform: session.platform, score: session.finalScore, amount },
      'Game session settled',
    );
    return { gameId: session.gameId, amount, currency };
  }

  private normalize(input: SettleGameSessionInput) {
    const gameId = input.gameId.trim();
    if (gameId.length === 0) {
      throw new DomainError(SESSION_ERROR.INVALID_SESSION, 'gameId 不能为空');
    }
    if (!Number.isFinite(input.duration) || input.duration < 0) {
      throw new DomainError(SESSION_ERROR.INVALID_SESSION, '会话时长必须为非负数', {
        gameId,
        duration: input.duration,
      });
    }
    return {
      gameId,
      platform: input.platform.trim(),
      finalScore: input.finalScore,
      duration: input.duration,
      bonuses: (input.bonuses ?? []).map((b) => b.trim()).filter((b) => b.length > 0),
    };
  }
}
