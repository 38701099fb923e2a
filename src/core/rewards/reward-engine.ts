// src/core/rewards/reward-engine.ts
import { DomainError, REWARD_ERROR } from '@core/common/errors/domain-error';
import {
  compareDecimals,
  decimalCompute,
  decimalPlaces,
  decimalProduct,
  type RoundingMode,
} from '@core/common/numeric/decimal';
import {
  AMOUNT_SCALE,
  FEE_SCALE,
  type BonusTag,
  type EarningsResult,
  type PlatformFeeSplit,
  type PlatformTag,
  type RateTable,
} from '@app-types/models/reward.types';

/** 金额统一采用银行家舍入（round-half-to-even） */
export const MONEY_ROUNDING: RoundingMode = 'half-even';

/**
 * 收益引擎（纯计算，无 I/O、无隐藏状态）
 *
 * 费率表在构造时注入并视为只读，同一实例可被任意调用方并发复用。
 * 所有校验失败都以 DomainError 同步抛出，由调用方决定面向用户还是中止启动。
 */
export class RewardEngine {
  constructor(private readonly rateTable: RateTable) {}

  /**
   * 由原始分数计算收益
   * amount = round(score × baseRates[platform] × Π multipliers[tag], 4)
   * 同一加成重复出现时按出现次数重复相乘；未知加成等价于 1.0
   * @param score 非负整数分数
   * @param platform 平台标签
   * @param bonuses 加成标签序列（可为空）
   */
  calculateEarnings(
    score: number,
    platform: PlatformTag,
    bonuses: ReadonlyArray<BonusTag> = [],
  ): EarningsResult {
    if (!Number.isSafeInteger(score) || score < 0) {
      throw new DomainError(REWARD_ERROR.INVALID_SCORE, '分数必须为非负整数', { score });
    }
    const baseRate = this.baseRateOf(platform);
    const factors: number[] = [score, baseRate];
    for (const tag of bonuses) {
      factors.push(this.multiplierOf(tag));
    }
    const amount = decimalProduct(factors, AMOUNT_SCALE, MONEY_ROUNDING);
    return Object.freeze({ amount });
  }

  /**
   * 提现资格判定：requestedAmount >= minimumPayout（按输入的全部小数位精确比较，不预先舍入）
   * @param requestedAmount 申请提现金额（非负）
   * @param minimumPayout 最低提现金额
   */
  isPayoutEligible(requestedAmount: number, minimumPayout: number): boolean {
    this.assertAmount(requestedAmount, 'requestedAmount');
    this.assertAmount(minimumPayout, 'minimumPayout');
    return compareDecimals(requestedAmount, minimumPayout) >= 0;
  }

  /**
   * 从毛额中拆出平台手续费
   * feeAmount = round(amount × feePercentage / 100, 2)，netAmount = amount - feeAmount
   * @param amount 毛额（非负）
   * @param feePercentage 手续费百分比，取值 [0, 100]
   */
  applyPlatformFee(amount: number, feePercentage: number): PlatformFeeSplit {
    this.assertAmount(amount, 'amount');
    if (!Number.isFinite(feePercentage) || feePercentage < 0 || feePercentage > 100) {
      throw new DomainError(REWARD_ERROR.INVALID_AMOUNT, '手续费比例必须在 [0, 100] 之间', {
        feePercentage,
      });
    }
    const feeAmount = decimalProduct([amount, feePercentage, 0.01], FEE_SCALE, MONEY_ROUNDING);
    const netAmount = decimalCompute({
      op: 'sub',
      a: amount,
      b: feeAmount,
      outScale: Math.max(decimalPlaces(amount), FEE_SCALE),
    });
    return Object.freeze({ netAmount, feeAmount });
  }

  /**
   * 查询平台基础费率；不在费率表中的平台属于配置错误
   */
  baseRateOf(platform: PlatformTag): number {
    if (!Object.prototype.hasOwnProperty.call(this.rateTable.baseRates, platform)) {
      throw new DomainError(REWARD_ERROR.UNKNOWN_PLATFORM, `未配置的平台: ${platform}`, {
        platform,
        knownPlatforms: Object.keys(this.rateTable.baseRates),
      });
    }
    return this.rateTable.baseRates[platform];
  }

  /**
   * 查询加成系数；未知加成返回 1.0
   */
  multiplierOf(tag: BonusTag): number {
    return Object.prototype.hasOwnProperty.call(this.rateTable.multipliers, tag)
      ? this.rateTable.multipliers[tag]
      : 1;
  }

  private assertAmount(value: number, field: string): void {
    if (!Number.isFinite(value) || value < 0) {
      throw new DomainError(REWARD_ERROR.INVALID_AMOUNT, `${field} 必须为非负有限数`, {
        [field]: value,
      });
    }
  }
}
