// src/modules/common/integration-events/events.tokens.ts
/**
 * 集成事件 DI 令牌：用例层只注入 OUTBOX_WRITER，Dispatcher 注入 STORE 与 HANDLERS
 */
export const INTEGRATION_EVENTS_TOKENS = {
  OUTBOX_WRITER: Symbol('INTEV.OUTBOX_WRITER'),
  OUTBOX_STORE: Symbol('INTEV.OUTBOX_STORE'),
  HANDLERS: Symbol('INTEV.HANDLERS'),
} as const;
