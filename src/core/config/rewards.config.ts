// src/core/config/rewards.config.ts
import { DomainError, REWARD_ERROR } from '@core/common/errors/domain-error';
import type { RawRewardSettings } from '@core/rewards/reward-settings';
import { ConfigFactory } from '@nestjs/config';

const DEFAULT_BASE_RATES = { mobile: 0.001, web: 0.0008 };
const DEFAULT_MULTIPLIERS = { daily_bonus: 1.5, streak_bonus: 1.25, first_win: 2 };

/**
 * 读取 JSON 形式的环境变量；缺省时使用默认值
 * @param name 环境变量名
 * @param fallback 默认值
 */
function readJsonEnv(name: string, fallback: unknown): unknown {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (e) {
    throw new DomainError(REWARD_ERROR.INVALID_RATE_TABLE, `${name} 不是合法的 JSON`, { name }, e);
  }
}

/**
 * 奖励配置：费率表、提现门槛、手续费比例与结算币种
 * 这里只负责读取原始值，校验与冻结由 parseRewardSettings 在引擎构造前完成
 */
const rewardsConfig: ConfigFactory = () => {
  const rewards: RawRewardSettings = {
    baseRates: readJsonEnv('REWARDS_BASE_RATES', DEFAULT_BASE_RATES),
    multipliers: readJsonEnv('REWARDS_BONUS_MULTIPLIERS', DEFAULT_MULTIPLIERS),
    minimumPayoutAmount: process.env.MINIMUM_PAYOUT_AMOUNT || '5.00',
    platformFeePercentage: process.env.PLATFORM_FEE_PERCENTAGE || '10',
    currency: process.env.REWARDS_CURRENCY || 'usd',
  };
  return { rewards };
};

export default rewardsConfig;
