import 'reflect-metadata';

import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';

/**
 * 应用程序启动函数
 * 使用 NestJS ConfigService 获取配置信息
 */
async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // 获取 PinoLogger 实例并接管 Nest 内部日志
  const logger = app.get(Logger);
  app.useLogger(logger);

  const configService = app.get<ConfigService>(ConfigService);

  // SIGTERM/SIGINT 时触发 onModuleDestroy，停止 Outbox 调度器
  if (configService.get<boolean>('server.shutdownHooks', true)) {
    app.enableShutdownHooks();
  }

  const corsOrigins = configService.get<string[]>('server.corsOrigins', []);
  if (corsOrigins.length > 0) {
    app.enableCors({ origin: corsOrigins });
  }

  const host = configService.get<string>('server.host', '127.0.0.1');
  const port = configService.get<number>('server.port', 3000);
  const nodeEnv = configService.get<string>('NODE_ENV', 'development');

  await app.listen(port, host);

  logger.log(`🚀 NestJS 服务在 http://${host}:${port} 上以 ${nodeEnv} 模式启动成功`);
}

void bootstrap();
