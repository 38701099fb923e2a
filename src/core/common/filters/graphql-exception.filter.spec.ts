// src/core/common/filters/graphql-exception.filter.spec.ts
import { DomainError, PAYOUT_ERROR, REWARD_ERROR } from '@core/common/errors/domain-error';
import { BadRequestException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { Test } from '@nestjs/testing';
import { GraphQLError } from 'graphql';
import { PinoLogger } from 'nestjs-pino';
import { GqlAllExceptionsFilter, mapDomainErrorToGqlCode } from './graphql-exception.filter';

function gqlHost(fieldName: string): ExecutionContextHost {
  const host = new ExecutionContextHost([{}, {}, {}, { fieldName }]);
  host.setType('graphql');
  return host;
}

describe('GqlAllExceptionsFilter', () => {
  const logger = { setContext: jest.fn(), error: jest.fn() };
  let filter: GqlAllExceptionsFilter;

  beforeAll(async () => {
    const module = await Test.createTestingModule({
      providers: [GqlAllExceptionsFilter, { provide: PinoLogger, useValue: logger }],
    }).compile();
    filter = module.get(GqlAllExceptionsFilter);
  });

  it('DomainError 映射为 BAD_USER_INPUT 并携带业务码与详情', () => {
    const err = new DomainError(PAYOUT_ERROR.CURRENCY_MISMATCH, '提现币种与结算币种不一致', {
      expected: 'usd',
      actual: 'eur',
    });
    const result = filter.catch(err, gqlHost('quotePayout'));
    expect(result).toBeInstanceOf(GraphQLError);
    expect(result).toMatchObject({
      message: '提现币种与结算币种不一致',
      path: ['quotePayout'],
      extensions: {
        code: 'BAD_USER_INPUT',
        errorCode: 'CURRENCY_MISMATCH',
        details: { expected: 'usd', actual: 'eur' },
      },
    });
  });

  it('费率表错误属于服务端错误', () => {
    expect(mapDomainErrorToGqlCode(REWARD_ERROR.INVALID_RATE_TABLE)).toBe('INTERNAL_SERVER_ERROR');
    expect(mapDomainErrorToGqlCode(REWARD_ERROR.UNKNOWN_PLATFORM)).toBe('BAD_USER_INPUT');
  });

  it('校验失败的 HttpException 保留 INVALID_INPUT', () => {
    const err = new BadRequestException({
      errorCode: 'INVALID_INPUT',
      errorMessage: 'score: score must not be less than 0',
    });
    expect(filter.catch(err, gqlHost('calculateEarnings'))).toMatchObject({
      message: 'score: score must not be less than 0',
      extensions: { code: 'BAD_USER_INPUT', httpStatus: 400, errorCode: 'INVALID_INPUT' },
    });
  });

  it('未知异常映射为 INTERNAL_SERVER_ERROR，原始信息只写入日志', () => {
    const err = new RangeError('乘法结果超出安全整数范围 (inScale=3, outScale=4)');
    expect(filter.catch(err, gqlHost('calculateEarnings'))).toMatchObject({
      message: 'Internal server error',
      path: ['calculateEarnings'],
      extensions: { code: 'INTERNAL_SERVER_ERROR', httpStatus: 500, errorCode: 'INTERNAL_ERROR' },
    });
    expect(logger.error).toHaveBeenCalledWith(
      { err, path: ['calculateEarnings'] },
      'Unhandled GraphQL resolver error',
    );
  });

  it('非 Error 的抛出值同样返回通用信息', () => {
    expect(filter.catch('secret detail', gqlHost('rewardSettings'))).toMatchObject({
      message: 'Internal server error',
      extensions: { code: 'INTERNAL_SERVER_ERROR' },
    });
  });

  it('DomainError 不写错误日志', () => {
    filter.catch(new DomainError(REWARD_ERROR.INVALID_SCORE, '分数必须为非负整数'), gqlHost('x'));
    expect(logger.error).not.toHaveBeenCalled();
  });
});
