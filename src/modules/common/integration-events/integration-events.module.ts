// src/modules/common/integration-events/integration-events.module.ts
import { Module } from '@nestjs/common';
import { INTEGRATION_EVENTS_TOKENS } from './events.tokens';
import { GameSessionSettledHandler } from './handlers/game-session-settled.handler';
import { PayoutQuotedHandler } from './handlers/payout-quoted.handler';
import { OutboxDispatcher } from './outbox.dispatcher';
import { OutboxMemoryService } from './outbox.memory.service';

/**
 * Integration Events 模块：提供内存 Outbox 与调度器
 */
@Module({
  providers: [
    OutboxMemoryService,
    // Writer 与 Store 复用同一实例
    { provide: INTEGRATION_EVENTS_TOKENS.OUTBOX_WRITER, useExisting: OutboxMemoryService },
    { provide: INTEGRATION_EVENTS_TOKENS.OUTBOX_STORE, useExisting: OutboxMemoryService },
    GameSessionSettledHandler,
    PayoutQuotedHandler,
    {
      provide: INTEGRATION_EVENTS_TOKENS.HANDLERS,
      useFactory: (settled: GameSessionSettledHandler, quoted: PayoutQuotedHandler) => [
        settled,
        quoted,
      ],
      inject: [GameSessionSettledHandler, PayoutQuotedHandler],
    },
    OutboxDispatcher,
  ],
  exports: [
    INTEGRATION_EVENTS_TOKENS.OUTBOX_WRITER,
    INTEGRATION_EVENTS_TOKENS.OUTBOX_STORE,
    OutboxDispatcher,
  ],
})
export class IntegrationEventsModule {}
