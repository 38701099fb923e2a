// src/adapters/graphql/rewards/dto/rewards.input.ts
import { Field, Float, InputType, Int } from '@nestjs/graphql';
import {
  ArrayMaxSize,
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';

/**
 * 收益试算输入
 */
@InputType()
export class CalculateEarningsInput {
  @Field(() => Int, { description: '原始分数（非负整数）' })
  @IsInt()
  @Min(0)
  score!: number;

  @Field(() => String, { description: '平台标签，如 mobile / web' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(32)
  platform!: string;

  @Field(() => [String], { nullable: true, description: '加成标签，可重复' })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(32)
  @IsString({ each: true })
  bonuses?: string[];
}

/**
 * 游戏会话结算输入
 */
@InputType()
export class SettleGameSessionInput {
  @Field(() => String, { description: '游戏会话 ID' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  gameId!: string;

  @Field(() => String, { description: '平台标签' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(32)
  platform!: string;

  @Field(() => Int, { description: '最终分数（非负整数）' })
  @IsInt()
  @Min(0)
  finalScore!: number;

  // 负值交给用例层报 INVALID_SESSION
  @Field(() => Float, { description: '会话时长（秒）' })
  @IsNumber()
  duration!: number;

  @Field(() => [String], { nullable: true, description: '加成标签，可重复' })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(32)
  @IsString({ each: true })
  bonuses?: string[];
}

/**
 * 提现报价输入
 */
@InputType()
export class QuotePayoutInput {
  @Field(() => Float, { description: '申请提现金额' })
  @IsNumber({ allowNaN: false, allowInfinity: false })
  amount!: number;

  @Field(() => String, { description: '币种，大小写不敏感' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(8)
  currency!: string;

  @Field(() => Boolean, { nullable: true, description: '是否拆分平台手续费' })
  @IsOptional()
  @IsBoolean()
  applyFee?: boolean;

  @Field(() => String, { nullable: true, description: '幂等键，重试时保持不变' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  idempotencyKey?: string;
}
