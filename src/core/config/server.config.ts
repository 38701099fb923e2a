// src/core/config/server.config.ts
import { ConfigFactory } from '@nestjs/config';

/**
 * 逗号分隔的来源列表，例如 `https://play.example.com,https://admin.example.com`
 */
function parseOrigins(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((o) => o.trim())
    .filter((o) => o.length > 0);
}

const serverConfig: ConfigFactory = () => ({
  server: {
    host: process.env.APP_HOST || '127.0.0.1',
    port: parseInt(process.env.APP_PORT || '3000', 10),
    // SIGTERM 时触发 onModuleDestroy，停止事件调度器
    shutdownHooks: process.env.APP_SHUTDOWN_HOOKS !== 'false',
    // 为空则不开启 CORS（游戏客户端与账本服务均为服务端调用）
    corsOrigins: parseOrigins(process.env.APP_CORS_ORIGINS),
  },
});

export default serverConfig;
