// src/core/config/logger.config.ts
import { ConfigFactory } from '@nestjs/config';
import { IncomingMessage, ServerResponse } from 'http';

/**
 * 4xx 请求额外记录来源信息，便于排查异常的结算 / 提现调用
 */
const customPropsFor4xx = (req: IncomingMessage, res: ServerResponse): Record<string, unknown> => {
  const statusCode = res.statusCode ?? 0;
  if (statusCode < 400 || statusCode >= 500) return {};

  const forwardedRaw = req.headers?.['x-forwarded-for'];
  const xForwardedFor = Array.isArray(forwardedRaw) ? forwardedRaw.join(',') : forwardedRaw;
  const userAgentRaw = req.headers?.['user-agent'];
  const userAgent = Array.isArray(userAgentRaw) ? userAgentRaw.join(',') : userAgentRaw;

  return {
    remoteAddress: req.socket?.remoteAddress ?? null,
    xForwardedFor: xForwardedFor ?? null,
    method: req.method ?? null,
    url: req.url ?? null,
    userAgent: userAgent ?? null,
  };
};

/**
 * 只记录 GraphQL POST 与错误请求，其余 200 请求静默
 */
const customLogLevel = (req: IncomingMessage, res: ServerResponse, err?: Error) => {
  if (req.url === '/favicon.ico') return 'silent';
  if (res.statusCode >= 500 || err) return 'error';
  if (res.statusCode >= 400) return 'warn';
  if (res.statusCode === 200 && req.method === 'POST' && req.url === '/graphql') return 'info';
  return 'silent';
};

const loggerConfig: ConfigFactory = () => {
  const env = process.env.NODE_ENV ?? 'development';
  const isTest = env === 'test';
  const isDev = env !== 'production';
  const logPath = process.env.LOG_PATH || (isDev ? './logs' : '/var/log/play-rewards');

  // 测试环境不挂 transport，避免 worker 线程残留
  const transport = isTest
    ? undefined
    : isDev
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:dd HH:MM:ss',
            messageFormat: '{time} - [{context}] {method} {url} {statusCode} - {msg}',
            ignore: 'hostname,pid,req,context',
          },
        }
      : {
          targets: [
            {
              target: 'pino/file',
              options: { destination: `${logPath}/app.log`, mkdir: true },
              level: 'info',
            },
            {
              target: 'pino/file',
              options: { destination: `${logPath}/error.log`, mkdir: true },
              level: 'error',
            },
          ],
        };

  return {
    logger: {
      level: isTest ? 'silent' : isDev ? 'debug' : 'info',
      redactFields: ['req.headers.authorization'],
      customProps: customPropsFor4xx,
      customLogLevel,
      transport,
    },
  };
};

export default loggerConfig;
