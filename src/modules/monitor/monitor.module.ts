import { Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { CacheController } from './cache/cache.controller';
import { CacheService } from './cache/cache.service';
import { LogininforController } from './logininfor/logininfor.controller';
import { PgSysLoginLogDao, SysLoginLogDao } from './logininfor/logininfor.dao';
import { LogininforService } from './logininfor/logininfor.service';
import { MetricsController } from './metrics/metrics.controller';
import { MetricsService } from './metrics/metrics.service';
import { OnlineController } from './online/online.controller';
import { OnlineService } from './online/online.service';
import { OperLogController } from './operlog/operlog.controller';
import { OperLogDao, PgOperLogDao } from './operlog/operlog.dao';
import { OperLogInterceptor } from './operlog/operlog.interceptor';
import { OperLogService } from './operlog/operlog.service';
import { ServerController } from './server/server.controller';
import { ServerService } from './server/server.service';

/**
 * 系统监控：在线用户、登录日志、操作日志、缓存、服务器与指标。
 */
@Module({
  controllers: [
    OnlineController,
    LogininforController,
    OperLogController,
    CacheController,
    ServerController,
    MetricsController,
  ],
  providers: [
    { provide: SysLoginLogDao, useClass: PgSysLoginLogDao },
    { provide: OperLogDao, useClass: PgOperLogDao },
    { provide: APP_INTERCEPTOR, useClass: OperLogInterceptor },
    OnlineService,
    LogininforService,
    OperLogService,
    CacheService,
    ServerService,
    MetricsService,
  ],
  exports: [LogininforService, OperLogService],
})
export class MonitorModule {}
