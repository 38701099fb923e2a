// src/adapters/graphql/decorators/correlation-id.decorator.ts
import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { GqlExecutionContext } from '@nestjs/graphql';

/**
 * 从 GraphQL 上下文的请求对象中提取关联 ID
 * pino-http 已把请求 ID 写到 `req.id`，拿不到时返回 undefined
 * @param req 请求对象（仅依赖最小形状）
 */
export function extractCorrelationId(req: object | undefined): string | undefined {
  if (!req) return undefined;
  const id: unknown = Reflect.get(req, 'id');
  if (typeof id === 'string' && id.length > 0) return id;
  if (typeof id === 'number') return String(id);
  return undefined;
}

/**
 * 获取当前请求关联 ID 的参数装饰器
 */
export const correlationId = createParamDecorator(
  (_data: unknown, context: ExecutionContext): string | undefined => {
    const gqlCtx = GqlExecutionContext.create(context);
    const graphqlContext = gqlCtx.getContext<{ req?: object }>();
    return extractCorrelationId(graphqlContext.req);
  },
);
