// src/core/logger/logger.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { IncomingMessage, ServerResponse } from 'http';
import { LoggerModule as PinoLoggerModule } from 'nestjs-pino';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * 复用上游传入的请求 ID，否则生成新的；同时回写到响应头
 * 该 ID 也会作为集成事件的 correlationId
 */
export const genRequestId = (req: IncomingMessage, res: ServerResponse): string => {
  const incoming = req.headers[REQUEST_ID_HEADER];
  const id = typeof incoming === 'string' && incoming.trim() !== '' ? incoming.trim() : randomUUID();
  res.setHeader(REQUEST_ID_HEADER, id);
  return id;
};

/**
 * Pino 日志模块：级别 / transport / 脱敏字段来自 logger 配置
 */
@Module({
  imports: [
    ConfigModule,
    PinoLoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        pinoHttp: {
          level: configService.get<string>('logger.level', 'info'),
          transport: configService.get('logger.transport'),
          redact: configService.get<string[]>('logger.redactFields', []),
          customProps: configService.get('logger.customProps'),
          customLogLevel: configService.get('logger.customLogLevel'),
          genReqId: genRequestId,
        },
      }),
    }),
  ],
})
export class LoggerModule {}
