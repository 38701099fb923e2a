// src/adapters/graphql/rewards/dto/rewards.dto.ts
import { Field, Float, ObjectType } from '@nestjs/graphql';
import GraphQLJSON from 'graphql-type-json';

@ObjectType({ description: '当前生效的奖励设置' })
export class RewardSettingsType {
  // 运行时为 Record<string, number>
  @Field(() => GraphQLJSON, { description: '平台基础费率（平台 → 每分收益）' })
  baseRates!: Record<string, number>;

  @Field(() => GraphQLJSON, { description: '加成系数（加成 → 系数）' })
  multipliers!: Record<string, number>;

  @Field(() => Float, { description: '最低提现金额' })
  minimumPayoutAmount!: number;

  @Field(() => Float, { description: '平台手续费百分比' })
  platformFeePercentage!: number;

  @Field(() => String, { description: '结算币种' })
  currency!: string;
}

@ObjectType({ description: '收益试算结果' })
export class EarningsResultType {
  @Field(() => Float, { description: '收益金额（4 位小数）' })
  amount!: number;

  @Field(() => Boolean, { description: '该金额单笔提现是否达到门槛' })
  eligibleForPayout!: boolean;
}

@ObjectType({ description: '游戏会话结算结果' })
export class SessionEarningsType {
  @Field(() => String)
  gameId!: string;

  @Field(() => Float, { description: '收益金额（4 位小数）' })
  amount!: number;

  @Field(() => String)
  currency!: string;
}

@ObjectType({ description: '提现报价' })
export class PayoutQuoteType {
  @Field(() => Boolean, { description: '是否达到最低提现金额' })
  eligible!: boolean;

  @Field(() => Float, { description: '申请金额' })
  amount!: number;

  @Field(() => Float, { description: '最低提现金额' })
  minimumPayout!: number;

  @Field(() => String)
  currency!: string;

  @Field(() => Float, { nullable: true, description: '扣除手续费后的到账金额' })
  netAmount?: number;

  @Field(() => Float, { nullable: true, description: '平台手续费（2 位小数）' })
  feeAmount?: number;
}
