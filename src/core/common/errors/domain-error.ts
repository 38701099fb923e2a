// src/core/common/errors/domain-error.ts
// 领域错误与错误码：跨层共享的核心错误定义

/**
 * 领域错误类
 * 用于表示业务逻辑层的错误，可在 Core、Usecase 和 Adapter 层之间传递
 */
export class DomainError extends Error {
  readonly code: string;
  readonly details?: unknown;
  readonly cause?: unknown;

  constructor(code: string, message: string, details?: unknown, cause?: unknown) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
    this.details = details;
    this.cause = cause;

    // 兼容某些编译目标/测试环境的原型链问题，确保 instanceof 正常
    Object.setPrototypeOf(this, new.target.prototype);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DomainError);
    }
  }

  toJSON() {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

// 收益计算相关错误码（分数 / 平台 / 金额 / 费率表）
export const REWARD_ERROR = {
  INVALID_SCORE: 'INVALID_SCORE',
  UNKNOWN_PLATFORM: 'UNKNOWN_PLATFORM',
  INVALID_AMOUNT: 'INVALID_AMOUNT',
  INVALID_RATE_TABLE: 'INVALID_RATE_TABLE',
} as const;
Object.freeze(REWARD_ERROR);

// 游戏会话结算错误码
export const SESSION_ERROR = {
  INVALID_SESSION: 'INVALID_SESSION',
} as const;
Object.freeze(SESSION_ERROR);

// 提现相关错误码
export const PAYOUT_ERROR = {
  CURRENCY_MISMATCH: 'CURRENCY_MISMATCH',
  INVALID_AMOUNT: REWARD_ERROR.INVALID_AMOUNT, // 复用同一码值，避免前端分裂
} as const;
Object.freeze(PAYOUT_ERROR);

// 类型辅助
export type RewardErrorCode = (typeof REWARD_ERROR)[keyof typeof REWARD_ERROR];
export type SessionErrorCode = (typeof SESSION_ERROR)[keyof typeof SESSION_ERROR];
export type PayoutErrorCode = (typeof PAYOUT_ERROR)[keyof typeof PAYOUT_ERROR];

// 类型守卫：统一判断是否为领域错误（兼容多包/反序列化场景）
export const isDomainError = (error: unknown): error is DomainError => {
  if (error instanceof DomainError) return true;
  if (!error || typeof error !== 'object') return false;
  return Reflect.get(error, 'name') === 'DomainError' && typeof Reflect.get(error, 'code') === 'string';
};
