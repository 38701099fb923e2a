// src/core/common/integration-events/events.types.ts
/**
 * 事件类型（采用过去式命名）
 * - GameSessionSettled：一局游戏完成收益结算，供外部账本入账
 * - PayoutQuoted：提现报价通过门槛校验，供外部支付服务发起打款
 */
export type IntegrationEventType = 'GameSessionSettled' | 'PayoutQuoted';

export type ISO8601String = string & { readonly brand: 'ISO8601' };
export type DedupKey = string & { readonly brand: 'DedupKey' };

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue =
  | JsonPrimitive
  | { readonly [k: string]: JsonValue }
  | ReadonlyArray<JsonValue>;

/**
 * 集成事件信封类型（用于 Outbox 投递）
 */
export interface IntegrationEventEnvelope<T extends IntegrationEventType = IntegrationEventType> {
  readonly type: T;
  readonly aggregateType: string;
  readonly aggregateId: number | string;
  readonly schemaVersion: number;
  readonly payload: Readonly<Record<string, JsonValue>>;
  readonly dedupKey?: DedupKey;
  readonly correlationId?: string;
  readonly occurredAt: ISO8601String;
  readonly deliverAfter?: ISO8601String;
  readonly priority?: number;
}

function toIso(date: Date): ISO8601String {
  return date.toISOString() as ISO8601String;
}

/**
 * 构造标准事件信封（纯函数）
 * dedupKey 默认为 `type:aggregateId:schemaVersion`
 * @param input 输入参数对象
 */
export function buildEnvelope<T extends IntegrationEventType>(input: {
  readonly type: T;
  readonly aggregateType: string;
  readonly aggregateId: number | string;
  readonly schemaVersion?: number;
  readonly payload?: Readonly<Record<string, JsonValue>>;
  readonly dedupKey?: string;
  readonly correlationId?: string;
  readonly occurredAt?: Date;
  readonly deliverAfter?: Date;
  readonly priority?: number;
}): IntegrationEventEnvelope<T> {
  const schemaVersion = input.schemaVersion ?? 1;
  const dedupKey = (input.dedupKey ??
    `${input.type}:${input.aggregateId}:${schemaVersion}`) as DedupKey;
  return Object.freeze({
    type: input.type,
    aggregateType: input.aggregateType,
    aggregateId: input.aggregateId,
    schemaVersion,
    payload: input.payload ?? {},
    dedupKey,
    correlationId: input.correlationId,
    occurredAt: toIso(input.occurredAt ?? new Date()),
    deliverAfter: input.deliverAfter ? toIso(input.deliverAfter) : undefined,
    priority: input.priority,
  });
}
