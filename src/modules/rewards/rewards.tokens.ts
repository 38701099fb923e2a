// src/modules/rewards/rewards.tokens.ts
export const REWARDS_TOKENS = {
  SETTINGS: Symbol('REWARDS.SETTINGS'),
  ENGINE: Symbol('REWARDS.ENGINE'),
} as const;
