import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './modules/app.module';
import { appConfig } from './shared/config/env';
import { configureApp } from './shared/startup/configure-app';
import { StartupState } from './shared/startup/startup-state';
import { SysConfigService } from './shared/sys-config/sys-config.service';

// 在应用启动前加载环境变量
dotenv.config();

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const cfg = appConfig();
  const app = configureApp(await NestFactory.create(AppModule));

  await app.listen(cfg.port);
  logger.log(`${cfg.name} ${cfg.version} 正在启动，端口 ${cfg.port}`);

  // 参数配置预热到 Redis，Redis 不可用时降级为直接查库
  await app.get(SysConfigService).loadConfigCache();

  app.get(StartupState).markReady();
  logger.log(`${cfg.name} 启动完成`);
}

bootstrap().catch((err: unknown) => {
  const stack = err instanceof Error ? err.stack : String(err);
  logger.error('服务启动失败', stack);
  process.exit(1);
});
