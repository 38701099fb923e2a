// src/modules/common/integration-events/handlers/payout-quoted.handler.ts
import type { IntegrationEventEnvelope } from '@core/common/integration-events/events.types';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import type { IntegrationEventHandler } from '../outbox.dispatcher';

/**
 * PayoutQuoted 事件处理器（无状态，去重由 Outbox 负责）
 */
@Injectable()
export class PayoutQuotedHandler implements IntegrationEventHandler {
  readonly type = 'PayoutQuoted' as const;

  constructor(private readonly logger: PinoLogger) {
    this.logger.setContext(PayoutQuotedHandler.name);
  }

  async handle(envelope: IntegrationEventEnvelope): Promise<void> {
    const key = envelope.dedupKey ?? `${envelope.type}:${envelope.aggregateId}`;
    await Promise.resolve();
    const { amount, netAmount, feeAmount, currency } = envelope.payload;
    this.logger.info(
      { dedupKey: key, amount, netAmount, feeAmount, currency, correlationId: envelope.correlationId },
      'Payout quote accepted',
    );
  }
}
