// src/core/rewards/reward-settings.ts
import { DomainError, REWARD_ERROR } from '@core/common/errors/domain-error';
import type { RateTable, RewardSettings } from '@app-types/models/reward.types';

/**
 * 配置源提供的原始奖励设置（尚未校验）
 */
export interface RawRewardSettings {
  readonly baseRates: unknown;
  readonly multipliers: unknown;
  readonly minimumPayoutAmount: unknown;
  readonly platformFeePercentage: unknown;
  readonly currency: unknown;
}

function invalid(message: string, details?: Record<string, unknown>): DomainError {
  return new DomainError(REWARD_ERROR.INVALID_RATE_TABLE, message, details);
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 将 “标签 → 非负数” 的映射规范化并冻结
 * @param value 原始映射
 * @param field 字段名（用于错误信息）
 */
function parseRateRecord(value: unknown, field: string): Readonly<Record<string, number>> {
  if (!isPlainRecord(value)) {
    throw invalid(`${field} 必须为对象`, { field });
  }
  const out: Record<string, number> = {};
  for (const [rawKey, rawRate] of Object.entries(value)) {
    const key = rawKey.trim();
    if (key.length === 0) {
      throw invalid(`${field} 中存在空标签`, { field });
    }
    const rate = typeof rawRate === 'string' && rawRate.trim() !== '' ? Number(rawRate) : rawRate;
    if (typeof rate !== 'number' || !Number.isFinite(rate) || rate < 0) {
      throw invalid(`${field}.${key} 必须为非负有限数`, { field, key });
    }
    out[key] = rate;
  }
  return Object.freeze(out);
}

/**
 * 校验并冻结费率表
 * - baseRates 至少包含一个平台
 * - multipliers 可以为空
 * @param input 原始费率与系数
 */
export function parseRateTable(input: { baseRates: unknown; multipliers: unknown }): RateTable {
  const baseRates = parseRateRecord(input.baseRates, 'baseRates');
  if (Object.keys(baseRates).length === 0) {
    throw invalid('baseRates 至少需要配置一个平台', { field: 'baseRates' });
  }
  const multipliers = parseRateRecord(input.multipliers ?? {}, 'multipliers');
  return Object.freeze({ baseRates, multipliers });
}

function toFiniteNumber(value: unknown): number | null {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? n : null;
}

/**
 * 校验完整的奖励设置（启动时调用一次，失败即中止初始化）
 * @param raw 配置源的原始值
 */
export function parseRewardSettings(raw: RawRewardSettings): RewardSettings {
  const rateTable = parseRateTable(raw);

  const minimumPayoutAmount = toFiniteNumber(raw.minimumPayoutAmount);
  if (minimumPayoutAmount === null || minimumPayoutAmount < 0) {
    throw invalid('minimumPayoutAmount 必须为非负有限数', { field: 'minimumPayoutAmount' });
  }

  const platformFeePercentage = toFiniteNumber(raw.platformFeePercentage);
  if (platformFeePercentage === null || platformFeePercentage < 0 || platformFeePercentage > 100) {
    throw invalid('platformFeePercentage 必须在 [0, 100] 之间', {
      field: 'platformFeePercentage',
    });
  }

  const currency = typeof raw.currency === 'string' ? raw.currency.trim().toLowerCase() : '';
  if (currency.length === 0) {
    throw invalid('currency 不能为空', { field: 'currency' });
  }

  return Object.freeze({ rateTable, minimumPayoutAmount, platformFeePercentage, currency });
}
