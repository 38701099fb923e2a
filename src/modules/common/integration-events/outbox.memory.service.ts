// src/modules/common/integration-events/outbox.memory.service.ts
import type { IntegrationEventEnvelope } from '@core/common/integration-events/events.types';
import type {
  IOutboxStorePort,
  IOutboxWriterPort,
  OutboxDispatchPolicy,
  OutboxReadyItem,
  OutboxSnapshot,
} from '@core/common/integration-events/outbox.port';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

type QueuedEvent = {
  readonly envelope: IntegrationEventEnvelope;
  attempts: number;
  nextAttemptAt: number; // epoch ms
};

/**
 * 内存版 Outbox：同时实现 Writer + Store 端口
 * 进程重启即丢失，外部账本需要持久化时替换为 DB 实现
 *
 * 去重分两段：
 * - 排队中的 dedupKey：同 key 重复入队直接跳过
 * - 已投递的 dedupKey：按投递顺序保留最近 `deliveredKeysCap` 个，投递后再来的同 key 事件同样跳过
 * 进入失败集合的事件释放其 key，允许上游重新上报
 */
@Injectable()
export class OutboxMemoryService implements IOutboxWriterPort, IOutboxStorePort {
  private readonly queue: QueuedEvent[] = [];
  private readonly failed: QueuedEvent[] = [];
  private readonly dedupSet = new Set<string>();
  // Set 保持插入顺序，首个元素即最早投递的 key
  private readonly delivered = new Set<string>();
  private readonly deliveredKeysCap: number;

  constructor(config: ConfigService) {
    const policy = config.get<OutboxDispatchPolicy>('integrationEvents');
    if (!policy) {
      throw new Error('integrationEvents config is not loaded');
    }
    this.deliveredKeysCap = policy.deliveredKeysCap;
  }

  /**
   * 入箱单条事件
   * @param envelope 事件信封
   */
  async enqueue(envelope: IntegrationEventEnvelope): Promise<void> {
    await this.enqueueMany([envelope]);
  }

  /**
   * 入箱批量事件
   * @param envelopes 事件信封列表
   */
  async enqueueMany(envelopes: ReadonlyArray<IntegrationEventEnvelope>): Promise<void> {
    await Promise.resolve();
    const now = Date.now();
    for (const env of envelopes) {
      const key = env.dedupKey;
      if (key && (this.dedupSet.has(key) || this.delivered.has(key))) continue;
      if (key) this.dedupSet.add(key);
      const nextAttemptAt = env.deliverAfter ? Date.parse(env.deliverAfter) : now;
      this.queue.push({ envelope: env, attempts: 0, nextAttemptAt });
    }
  }

  /**
   * 拉取就绪批次（不移除），优先级高者在前，同优先级按到期时间
   * @param maxCount 最大批量数
   */
  pullReady(maxCount: number): ReadonlyArray<OutboxReadyItem> {
    const now = Date.now();
    return this.queue
      .filter((e) => e.nextAttemptAt <= now)
      .sort(
        (a, b) =>
          (b.envelope.priority ?? 0) - (a.envelope.priority ?? 0) ||
          a.nextAttemptAt - b.nextAttemptAt,
      )
      .slice(0, maxCount)
      .map((e) => ({ envelope: e.envelope, attempts: e.attempts }));
  }

  /**
   * 标记成功并移除，dedupKey 转入已投递集合
   */
  markSucceeded(env: IntegrationEventEnvelope): void {
    this.removeFromQueue(env);
    if (env.dedupKey) this.rememberDelivered(env.dedupKey);
  }

  /**
   * 计划重试；达到 maxAttempts 后移入失败集合
   */
  scheduleRetry(env: IntegrationEventEnvelope, backoffMs: number, maxAttempts: number): void {
    const item = this.queue.find((q) => q.envelope === env);
    if (!item) return;
    item.attempts += 1;
    if (item.attempts >= maxAttempts) {
      this.failed.push(item);
      this.removeFromQueue(env);
      return;
    }
    item.nextAttemptAt = Date.now() + backoffMs;
  }

  /**
   * 队列指标快照
   */
  snapshot(): OutboxSnapshot {
    return { queued: this.queue.length, failed: this.failed.length };
  }

  /**
   * 失败事件列表（只读视图，供排查）
   */
  failedEvents(): ReadonlyArray<IntegrationEventEnvelope> {
    return this.failed.map((f) => f.envelope);
  }

  private rememberDelivered(key: string): void {
    this.delivered.delete(key);
    this.delivered.add(key);
    while (this.delivered.size > this.deliveredKeysCap) {
      const oldest = this.delivered.values().next();
      if (oldest.done) break;
      this.delivered.delete(oldest.value);
    }
  }

  private removeFromQueue(env: IntegrationEventEnvelope): void {
    const idx = this.queue.findIndex((q) => q.envelope === env);
    if (idx >= 0) this.queue.splice(idx, 1);
    if (env.dedupKey) this.dedupSet.delete(env.dedupKey);
  }
}
