// src/types/models/reward.types.ts

/** 平台标签，默认 mobile / web，可通过配置扩展（运行时以费率表为准） */
export type PlatformTag = string;

/** 加成标签，未知标签等价于系数 1.0 */
export type BonusTag = string;

/** 收益金额保留的小数位 */
export const AMOUNT_SCALE = 4;
/** 平台手续费保留的小数位 */
export const FEE_SCALE = 2;

/**
 * 费率表（进程级配置，启动时加载一次，之后只读）
 * 示例：
 * {
 *   "baseRates": { "mobile": 0.001, "web": 0.0008 },
 *   "multipliers": { "daily_bonus": 1.5 }
 * }
 */
export type RateTable = {
  readonly baseRates: Readonly<Record<PlatformTag, number>>;
  readonly multipliers: Readonly<Record<BonusTag, number>>;
};

/**
 * 游戏客户端在会话结束时提交的分数
 */
export interface ScoreSubmission {
  readonly rawScore: number;
  readonly platform: PlatformTag;
  readonly bonuses: ReadonlyArray<BonusTag>;
}

/**
 * 一次计算的输出；eligibleForPayout 由单独的资格判定得出
 */
export interface EarningsResult {
  readonly amount: number;
  readonly eligibleForPayout?: boolean;
}

/**
 * 平台手续费拆分结果
 */
export interface PlatformFeeSplit {
  readonly netAmount: number;
  readonly feeAmount: number;
}

/**
 * 奖励设置：费率表 + 提现门槛 + 手续费比例 + 结算币种
 */
export interface RewardSettings {
  readonly rateTable: RateTable;
  readonly minimumPayoutAmount: number;
  readonly platformFeePercentage: number;
  readonly currency: string;
}
