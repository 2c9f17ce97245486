import { Body, Controller, Get, Post, Req } from '@nestjs/common';
import { Request } from 'express';
import { ok } from '../../shared/api-response/api-response';
import { CacheEvict } from '../../shared/cache/cache.decorators';
import {
  ErrorRate,
  MonitorLoginOperation,
  TrackMetric,
} from '../../shared/monitor/monitor.decorators';
import { AppAuth, AppLoginUser, CurrentAppUser, Public } from '../auth/login-user';
import { AppAuthService } from './app-auth.service';
import { STATS_CACHE, USER_CACHE } from './app-user.cache';
import { AppLoginDto, AppRegisterDto, SmsSendDto } from './dto';

/**
 * App 端认证：/app/v1/auth*
 */
@Controller('/app/v1/auth')
@AppAuth()
export class AppAuthController {
  constructor(private readonly appAuthService: AppAuthService) {}

  @Public()
  @Post('/login')
  @MonitorLoginOperation('app_login')
  @TrackMetric({ name: 'app_login' })
  @ErrorRate({ operation: 'app_login', threshold: 0.2 })
  async login(@Body() dto: AppLoginDto, @Req() req: Request) {
    return ok(await this.appAuthService.login(dto, req), '登录成功');
  }

  @Public()
  @Post('/register')
  @CacheEvict(USER_CACHE, STATS_CACHE)
  @TrackMetric({ name: 'app_user_created', tags: { source: 'register' } })
  async register(@Body() dto: AppRegisterDto) {
    const userId = await this.appAuthService.register(dto);
    return ok({ userId }, '注册成功');
  }

  @Post('/refresh')
  async refresh(@CurrentAppUser() user: AppLoginUser) {
    return ok(await this.appAuthService.refresh(user));
  }

  @Get('/profile')
  async profile(@CurrentAppUser() user: AppLoginUser) {
    return ok(await this.appAuthService.profile(user));
  }

  @Post('/logout')
  logout() {
    return ok(null, '退出成功');
  }

  @Public()
  @Post('/sms/send')
  async sendSms(@Body() dto: SmsSendDto) {
    return ok(await this.appAuthService.sendSmsCode(dto.phone), '验证码已发送');
  }
}
