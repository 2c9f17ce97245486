import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { AppUserModule } from './app-user/app-user.module';
import { AuthCoreModule } from './auth/auth-core.module';
import { AuthModule } from './auth/auth.module';
import { CaptchaModule } from './captcha/captcha.module';
import { GeneratorModule } from './generator/generator.module';
import { MonitorModule } from './monitor/monitor.module';
import { SystemModule } from './system/system.module';
import { CacheModule } from '../shared/cache/cache.module';
import { DatabaseModule } from '../shared/database/database.module';
import { MetricsModule } from '../shared/monitor/metrics.module';
import { RedisModule } from '../shared/redis/redis.module';
import { RedisCheckMiddleware } from '../shared/startup/redis-check.middleware';
import { StartupCheckMiddleware } from '../shared/startup/startup-check.middleware';
import { StartupModule } from '../shared/startup/startup.module';
import { SysConfigModule } from '../shared/sys-config/sys-config.module';

/**
 * 根模块，聚合各业务模块。
 */
@Module({
  imports: [
    DatabaseModule,
    RedisModule,
    StartupModule,
    SysConfigModule,
    AuthCoreModule,
    MetricsModule,
    CacheModule,
    AuthModule,
    CaptchaModule,
    SystemModule,
    MonitorModule,
    AppUserModule,
    GeneratorModule,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(StartupCheckMiddleware, RedisCheckMiddleware).forRoutes('*');
  }
}
