// src/modules/common/integration-events/handlers/game-session-settled.handler.ts
import type { IntegrationEventEnvelope } from '@core/common/integration-events/events.types';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import type { IntegrationEventHandler } from '../outbox.dispatcher';

/**
 * GameSessionSettled 事件处理器（无状态）
 * 目前仅落日志，外部账本接入后在此转发；重复事件由 Outbox 按 dedupKey 拦截，账本侧同样以 dedupKey 幂等
 */
@Injectable()
export class GameSessionSettledHandler implements IntegrationEventHandler {
  readonly type = 'GameSessionSettled' as const;

  constructor(private readonly logger: PinoLogger) {
    this.logger.setContext(GameSessionSettledHandler.name);
  }

  async handle(envelope: IntegrationEventEnvelope): Promise<void> {
    const key = envelope.dedupKey ?? `${envelope.type}:${envelope.aggregateId}`;
    await Promise.resolve();
    this.logger.info(
      {
        dedupKey: key,
        gameId: envelope.aggregateId,
        platform: envelope.payload.platform,
        amount: envelope.payload.amount,
        correlationId: envelope.correlationId,
      },
      'Game session earnings settled',
    );
  }
}
