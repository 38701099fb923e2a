// src/usecases/rewards/quote-payout.usecase.ts
import type { RewardSettings } from '@app-types/models/reward.types';
import { DomainError, PAYOUT_ERROR } from '@core/common/errors/domain-error';
import { buildEnvelope } from '@core/common/integration-events/events.types';
import type { IOutboxWriterPort } from '@core/common/integration-events/outbox.port';
import { RewardEngine } from '@core/rewards/reward-engine';
import { INTEGRATION_EVENTS_TOKENS } from '@modules/common/integration-events/events.tokens';
import { REWARDS_TOKENS } from '@modules/rewards/rewards.tokens';
import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { PinoLogger } from 'nestjs-pino';

export interface QuotePayoutInput {
  readonly amount: number;
  readonly currency: string;
  readonly applyFee?: boolean;
  /** 调用方提供的幂等键；同一键的重复报价只投递一次事件 */
  readonly idempotencyKey?: string;
  readonly correlationId?: string;
}

export interface PayoutQuote {
  readonly eligible: boolean;
  readonly amount: number;
  readonly minimumPayout: number;
  readonly currency: string;
  readonly netAmount?: number;
  readonly feeAmount?: number;
}

/**
 * 提现报价用例
 *
 * 只对单笔申请金额做门槛判断，累计余额由外部账本维护。
 * 达标的报价投递 PayoutQuoted，由支付服务发起打款。
 * 报价 ID 依次取 idempotencyKey、correlationId，都没有时才生成 UUID；
 * 同一报价 ID 生成同一 dedupKey，重试不会重复触发打款。
 */
@Injectable()
export class QuotePayoutUsecase {
  constructor(
    @Inject(REWARDS_TOKENS.ENGINE) private readonly engine: RewardEngine,
    @Inject(REWARDS_TOKENS.SETTINGS) private readonly settings: RewardSettings,
    @Inject(INTEGRATION_EVENTS_TOKENS.OUTBOX_WRITER) private readonly outbox: IOutboxWriterPort,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(QuotePayoutUsecase.name);
  }

  async execute(input: QuotePayoutInput): Promise<PayoutQuote> {
    const currency = input.currency.trim().toLowerCase();
    if (currency !== this.settings.currency) {
      throw new DomainError(PAYOUT_ERROR.CURRENCY_MISMATCH, '提现币种与结算币种不一致', {
        expected: this.settings.currency,
        actual: input.currency,
      });
    }

    const minimumPayout = this.settings.minimumPayoutAmount;
    const eligible = this.engine.isPayoutEligible(input.amount, minimumPayout);
    if (!eligible) {
      this.logger.debug({ amount: input.amount, minimumPayout }, 'Payout below minimum');
      return { eligible, amount: input.amount, minimumPayout, currency };
    }

    const split = input.applyFee
      ? this.engine.applyPlatformFee(input.amount, this.settings.platformFeePercentage)
      : undefined;
    const quote: PayoutQuote = { eligible, amount: input.amount, minimumPayout, currency, ...split };

    const quoteId = input.idempotencyKey ?? input.correlationId ?? randomUUID();
    await this.outbox.enqueue(
      buildEnvelope({
        type: 'PayoutQuoted',
        aggregateType: 'payout_quote',
        aggregateId: quoteId,
        payload: {
          amount: input.amount,
          currency,
          netAmount: split?.netAmount ?? null,
          feeAmount: split?.feeAmount ?? null,
        },
        correlationId: input.correlationId,
      }),
    );
    this.logger.info(
      { quoteId, amount: input.amount, feeAmount: split?.feeAmount },
      'Payout quoted',
    );
    return quote;
  }
}
