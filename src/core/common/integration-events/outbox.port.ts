// src/core/common/integration-events/outbox.port.ts
import type { IntegrationEventEnvelope } from './events.types';

/**
 * Outbox 写入端口（用例层只依赖该端口）
 * 同一 dedupKey 重复写入时由实现方去重
 */
export interface IOutboxWriterPort {
  enqueue(envelope: IntegrationEventEnvelope): Promise<void>;
  enqueueMany(envelopes: ReadonlyArray<IntegrationEventEnvelope>): Promise<void>;
}

export interface IOutboxDispatcherPort {
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Outbox Store 端口（供 Dispatcher 使用）
 */
export interface IOutboxStorePort {
  /** 拉取就绪事件批次（不移除），高优先级在前 */
  pullReady(maxCount: number): ReadonlyArray<OutboxReadyItem>;

  markSucceeded(env: IntegrationEventEnvelope): void;

  /**
   * 记一次失败：未达上限则延后 backoffMs 再投递，否则移入失败集合
   */
  scheduleRetry(env: IntegrationEventEnvelope, backoffMs: number, maxAttempts: number): void;

  snapshot(): OutboxSnapshot;

  /** 已放弃投递的事件，供人工排查或补发 */
  failedEvents(): ReadonlyArray<IntegrationEventEnvelope>;
}

export interface OutboxReadyItem {
  readonly envelope: IntegrationEventEnvelope;
  /** 已失败次数 */
  readonly attempts: number;
}

export interface OutboxSnapshot {
  readonly queued: number;
  readonly failed: number;
}

/**
 * 调度策略：第 n 次失败使用 backoffSeries[n-1]，超出序列长度时沿用最后一项
 */
export interface OutboxDispatchPolicy {
  readonly enabled: boolean;
  readonly batchSize: number;
  readonly maxAttempts: number;
  readonly intervalMs: number;
  readonly backoffSeries: ReadonlyArray<number>;
  /** 已投递 dedupKey 的保留上限，超出后淘汰最早投递的 key */
  readonly deliveredKeysCap: number;
}
