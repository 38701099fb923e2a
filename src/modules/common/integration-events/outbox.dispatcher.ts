// src/modules/common/integration-events/outbox.dispatcher.ts
import type { IntegrationEventEnvelope } from '@core/common/integration-events/events.types';
import type {
  IOutboxDispatcherPort,
  IOutboxStorePort,
  OutboxDispatchPolicy,
} from '@core/common/integration-events/outbox.port';
import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { INTEGRATION_EVENTS_TOKENS } from './events.tokens';

/**
 * 事件处理器接口
 */
export interface IntegrationEventHandler {
  readonly type: IntegrationEventEnvelope['type'];
  handle(envelope: IntegrationEventEnvelope): Promise<void>;
}

/**
 * 内存 Outbox 调度器：定期拉取就绪事件并分发给处理器
 */
@Injectable()
export class OutboxDispatcher implements OnModuleInit, OnModuleDestroy, IOutboxDispatcherPort {
  private timer: NodeJS.Timeout | null = null;
  private readonly policy: OutboxDispatchPolicy;
  private isTicking = false;
  private running = false;

  constructor(
    config: ConfigService,
    @Inject(INTEGRATION_EVENTS_TOKENS.OUTBOX_STORE)
    private readonly store: IOutboxStorePort,
    @Inject(INTEGRATION_EVENTS_TOKENS.HANDLERS)
    private readonly handlers: ReadonlyArray<IntegrationEventHandler>,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(OutboxDispatcher.name);
    const policy = config.get<OutboxDispatchPolicy>('integrationEvents');
    if (!policy) {
      throw new Error('integrationEvents config is not loaded');
    }
    this.policy = policy;
  }

  /**
   * 模块初始化：按配置启动调度器
   */
  async onModuleInit(): Promise<void> {
    if (!this.policy.enabled) return;
    this.running = true;
    this.scheduleNextTick();
    await Promise.resolve();
  }

  /**
   * 模块销毁：停止调度器
   */
  async onModuleDestroy(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await Promise.resolve();
  }

  async start(): Promise<void> {
    if (this.running) return;
    await this.onModuleInit();
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    await this.onModuleDestroy();
  }

  /**
   * 执行一次分发
   * - 同一事件类型可注册多个处理器，按顺序执行（多播）
   * - 任一处理器失败则整条事件按退避序列重试（处理器需保证幂等）
   * @returns 本轮处理的事件数
   */
  async dispatchOnce(): Promise<number> {
    const ready = this.store.pullReady(this.policy.batchSize);
    for (const item of ready) {
      const matched = this.handlers.filter((h) => h.type === item.envelope.type);
      let failure: unknown = null;
      for (const handler of matched) {
        try {
          await handler.handle(item.envelope);
        } catch (e) {
          failure = e;
          break;
        }
      }
      if (failure === null) {
        this.store.markSucceeded(item.envelope);
        continue;
      }
      const series = this.policy.backoffSeries;
      const backoffMs = series[Math.min(item.attempts, series.length - 1)];
      this.logger.warn(
        {
          type: item.envelope.type,
          dedupKey: item.envelope.dedupKey,
          attempts: item.attempts + 1,
          backoffMs,
          err: failure,
        },
        'IntegrationEvent handler failed, retry scheduled',
      );
      this.store.scheduleRetry(item.envelope, backoffMs, this.policy.maxAttempts);
    }
    return ready.length;
  }

  private async tick(): Promise<void> {
    if (this.isTicking) return; // 防止并发重入
    this.isTicking = true;
    try {
      await this.dispatchOnce();
    } catch (e) {
      this.logger.error({ err: e }, 'IntegrationEvent dispatch tick failed');
    } finally {
      this.isTicking = false;
      if (this.running) this.scheduleNextTick();
    }
  }

  /**
   * 安排下一次调度（setTimeout 自调度，避免重入）
   */
  private scheduleNextTick(): void {
    if (!this.policy.enabled || !this.running) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      void this.tick();
    }, this.policy.intervalMs);
    // 不阻止进程退出
    this.timer.unref();
  }
}
