// src/core/config/integration-events.config.ts
import type { OutboxDispatchPolicy } from '@core/common/integration-events/outbox.port';
import { ConfigFactory } from '@nestjs/config';

export const DEFAULT_BACKOFF_SERIES: ReadonlyArray<number> = [1000, 5000, 30000, 120000, 600000];

function toPositiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

/**
 * 解析 `1000,5000,30000` 形式的退避序列；非法项忽略，全部非法时使用默认序列
 */
export function parseBackoffSeries(raw: string | undefined): ReadonlyArray<number> {
  if (!raw) return DEFAULT_BACKOFF_SERIES;
  const parsed = raw
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v !== '')
    .map(Number)
    .filter((v) => Number.isFinite(v) && v >= 0);
  return parsed.length > 0 ? parsed : DEFAULT_BACKOFF_SERIES;
}

const integrationEventsConfig: ConfigFactory = () => {
  const integrationEvents: OutboxDispatchPolicy = {
    enabled: (process.env.INTEV_ENABLED ?? 'true').toLowerCase() !== 'false',
    batchSize: toPositiveInt(process.env.INTEV_BATCH_SIZE, 100),
    maxAttempts: toPositiveInt(process.env.INTEV_MAX_ATTEMPTS, 5),
    intervalMs: toPositiveInt(process.env.INTEV_DISPATCH_INTERVAL_MS, 1000),
    backoffSeries: parseBackoffSeries(process.env.INTEV_BACKOFF_SERIES),
    deliveredKeysCap: toPositiveInt(process.env.INTEV_DELIVERED_KEYS_CAP, 10000),
  };
  return { integrationEvents };
};

export default integrationEventsConfig;
