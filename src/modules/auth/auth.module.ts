import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { CaptchaModule } from '../captcha/captcha.module';
import { MonitorModule } from '../monitor/monitor.module';
import { SystemModule } from '../system/system.module';
import { AuthController } from './auth.controller';
import { AuthGuard } from './auth.guard';
import { AuthService } from './auth.service';

/**
 * 认证模块：登录、当前用户与全局鉴权守卫。
 */
@Module({
  imports: [SystemModule, MonitorModule, CaptchaModule],
  controllers: [AuthController],
  providers: [AuthService, { provide: APP_GUARD, useClass: AuthGuard }],
})
export class AuthModule {}
