import { Body, Controller, Get, Headers, Post, Req } from '@nestjs/common';
import { Request } from 'express';
import { ok } from '../../shared/api-response/api-response';
import {
  ErrorRate,
  MonitorLoginOperation,
  TrackMetric,
} from '../../shared/monitor/monitor.decorators';
import { AuthService } from './auth.service';
import { LoginDto, LoginResp } from './dto/login.dto';
import { CurrentUser, LoginUser, Public } from './login-user';

/**
 * 管理端认证：/login、/getInfo、/getRouters、/logout。
 */
@Controller()
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Public()
  @Post('/login')
  @MonitorLoginOperation('admin_login')
  @TrackMetric({ name: 'admin_login' })
  @ErrorRate({ operation: 'admin_login', threshold: 0.2 })
  async login(@Body() dto: LoginDto, @Req() req: Request) {
    const token = await this.authService.login(dto, req);
    const resp: LoginResp = { token };
    return ok(resp, '登录成功');
  }

  @Get('/getInfo')
  async getInfo(@CurrentUser() user: LoginUser) {
    return ok(await this.authService.getInfo(user));
  }

  @Get('/getRouters')
  async getRouters(@CurrentUser() user: LoginUser) {
    return ok(await this.authService.getRouters(user));
  }

  @Public()
  @Post('/logout')
  async logout(@Headers('authorization') authorization?: string) {
    await this.authService.logout(authorization);
    return ok(null, '退出成功');
  }
}
