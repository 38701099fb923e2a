// src/core/common/filters/graphql-exception.filter.ts
import { ExceptionPayload } from '@app-types/errors/exception-payload';
import {
  DomainError,
  isDomainError,
  PAYOUT_ERROR,
  REWARD_ERROR,
  SESSION_ERROR,
} from '@core/common/errors/domain-error';
import { ArgumentsHost, Catch, HttpException } from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import { GqlArgumentsHost } from '@nestjs/graphql';
import { GraphQLError, GraphQLResolveInfo } from 'graphql';
import { PinoLogger } from 'nestjs-pino';

/** 将 HTTP 状态码映射为 GraphQL 标准错误类别代码（extensions.code）
 *  注意：这是 GraphQL/Apollo 通用的大类，不是业务 errorCode（业务码放在 extensions.errorCode）
 */
export function mapHttpToGqlCode(status: number): string {
  switch (status) {
    case 400:
    case 422:
      return 'BAD_USER_INPUT';
    case 404:
      return 'NOT_FOUND';
    case 409:
      return 'CONFLICT';
    default:
      return 'INTERNAL_SERVER_ERROR';
  }
}

/** 将 DomainError 错误码映射为 GraphQL 错误类别 */
const DOMAIN_CODE_MAP: Readonly<Record<string, string>> = {
  [REWARD_ERROR.INVALID_SCORE]: 'BAD_USER_INPUT',
  [REWARD_ERROR.UNKNOWN_PLATFORM]: 'BAD_USER_INPUT',
  [REWARD_ERROR.INVALID_AMOUNT]: 'BAD_USER_INPUT',
  // 费率表非法属于部署配置问题，不是调用方的错
  [REWARD_ERROR.INVALID_RATE_TABLE]: 'INTERNAL_SERVER_ERROR',
  [SESSION_ERROR.INVALID_SESSION]: 'BAD_USER_INPUT',
  [PAYOUT_ERROR.CURRENCY_MISMATCH]: 'BAD_USER_INPUT',
};

export function mapDomainErrorToGqlCode(errorCode: string): string {
  return DOMAIN_CODE_MAP[errorCode] ?? 'BAD_USER_INPUT';
}

function isExceptionPayload(value: unknown): value is ExceptionPayload {
  return typeof value === 'object' && value !== null;
}

/** 从异常响应中提取错误信息 */
function extractPayload(resp: unknown): {
  code?: string;
  errorCode?: string;
  errorMessage?: string;
  fallbackMsg?: string;
} {
  if (typeof resp === 'string') {
    return { errorMessage: resp };
  }
  if (!isExceptionPayload(resp)) return {};
  const code = typeof resp.code === 'string' ? resp.code : undefined;
  const errorCode = typeof resp.errorCode === 'string' ? resp.errorCode : undefined;
  const explicitMsg = typeof resp.errorMessage === 'string' ? resp.errorMessage : undefined;

  let fallbackMsg: string | undefined;
  const msg = resp.message;
  if (Array.isArray(msg)) fallbackMsg = msg.join(', ');
  else if (typeof msg === 'string') fallbackMsg = msg;

  return { code, errorCode, errorMessage: explicitMsg, fallbackMsg };
}

/** 获取 GraphQL 字段路径 */
function getGqlPath(host: ArgumentsHost): string[] | undefined {
  const gqlHost = GqlArgumentsHost.create(host);
  const info = gqlHost.getInfo<GraphQLResolveInfo | undefined>();
  const field = info?.fieldName;
  return field ? [field] : undefined;
}

/** 根据 HttpException 构建 GraphQL 错误对象
 * - extensions.code：GraphQL 错误大类（默认由 HTTP 状态码映射；也可在异常响应体里传 code 覆盖）
 * - extensions.errorCode：业务细分错误码（如 ValidateInput 的 INVALID_INPUT）
 */
function buildGraphQLErrorFromHttpException(
  exception: HttpException,
  host: ArgumentsHost,
): GraphQLError {
  const status = exception.getStatus();
  const { code, errorCode, errorMessage, fallbackMsg } = extractPayload(exception.getResponse());
  const finalMessage = errorMessage ?? fallbackMsg ?? exception.message;

  return new GraphQLError(finalMessage, {
    path: getGqlPath(host),
    extensions: {
      code: code ?? mapHttpToGqlCode(status),
      httpStatus: status,
      ...(errorCode ? { errorCode } : {}),
      ...(errorMessage ? { errorMessage } : {}),
    },
  });
}

/** 从未知异常构建 GraphQL 错误；原始信息只进日志，不返回给调用方 */
function buildGraphQLErrorFromUnknown(path: string[] | undefined): GraphQLError {
  return new GraphQLError('Internal server error', {
    path,
    extensions: {
      code: 'INTERNAL_SERVER_ERROR',
      httpStatus: 500,
      errorCode: 'INTERNAL_ERROR',
    },
  });
}

/** 从 DomainError 构建 GraphQL 错误对象 */
function buildGraphQLErrorFromDomainError(
  exception: DomainError,
  host: ArgumentsHost,
): GraphQLError {
  return new GraphQLError(exception.message, {
    path: getGqlPath(host),
    extensions: {
      code: mapDomainErrorToGqlCode(exception.code),
      errorCode: exception.code,
      errorMessage: exception.message,
      ...(exception.details ? { details: exception.details } : {}),
    },
  });
}

/** GraphQL 全局异常过滤器 */
@Catch()
export class GqlAllExceptionsFilter extends BaseExceptionFilter {
  constructor(private readonly logger: PinoLogger) {
    super();
    this.logger.setContext(GqlAllExceptionsFilter.name);
  }

  override catch(exception: unknown, host: ArgumentsHost) {
    // HTTP 请求仍用默认处理；其余（GraphQL/RPC/WS）走下方分支
    if (host.getType() === 'http') {
      return super.catch(exception, host);
    }

    if (isDomainError(exception)) {
      return buildGraphQLErrorFromDomainError(exception, host);
    }

    if (exception instanceof HttpException) {
      return buildGraphQLErrorFromHttpException(exception, host);
    }

    const path = getGqlPath(host);
    this.logger.error({ err: exception, path }, 'Unhandled GraphQL resolver error');
    return buildGraphQLErrorFromUnknown(path);
  }
}
