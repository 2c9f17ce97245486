import { Injectable } from '@nestjs/common';
import { Request } from 'express';
import { ServiceWarning } from '../../shared/exception/exceptions';
import { RedisKeys } from '../../shared/redis/redis-keys';
import { RedisService } from '../../shared/redis/redis.service';
import { realIp } from '../../shared/request/client-info';
import { SysConfigService } from '../../shared/sys-config/sys-config.service';
import { AppTokenService } from '../auth/jwt/jwt.service';
import { AppLoginUser } from '../auth/login-user';
import { PasswordService, isStrongPassword } from '../auth/security/password.service';
import { AppLoginLogService } from './app-login-log.service';
import { AppUser } from './app-user.entity';
import { AppUserService, toAppUserResp } from './app-user.service';
import { AppLoginDto, AppLoginResp, AppRegisterDto, AppUserDetailResp } from './dto';

const PHONE_RULE = /^1[3-9]\d{9}$/;
/** 短信验证码有效期（秒）。 */
export const SMS_CODE_TTL = 5 * 60;
/** 未接入短信网关，固定返回该验证码。 */
export const MOCK_SMS_CODE = '123456';

/**
 * App 端登录、注册与 token 刷新。
 */
@Injectable()
export class AppAuthService {
  constructor(
    private readonly appUserService: AppUserService,
    private readonly loginLogService: AppLoginLogService,
    private readonly passwordService: PasswordService,
    private readonly tokenService: AppTokenService,
    private readonly sysConfig: SysConfigService,
    private readonly redis: RedisService,
  ) {}

  async login(dto: AppLoginDto, req: Request): Promise<AppLoginResp> {
    const account = dto.username.trim();
    let user: AppUser;
    try {
      user = await this.authenticate(account, dto.password);
    } catch (err) {
      if (err instanceof ServiceWarning) {
        await this.loginLogService.record(req, account, '1', err.message);
      }
      throw err;
    }
    await this.appUserService.recordLogin(user.userId, realIp(req));
    await this.loginLogService.record(req, user.userName, '0', '登录成功');
    const fresh = (await this.appUserService.findById(user.userId)) ?? user;
    return this.issue(fresh);
  }

  /**
   * 注册：两次密码一致 → 密码强度 → 手机号格式 → 注册开关 → 唯一性。
   */
  async register(dto: AppRegisterDto): Promise<number> {
    if (dto.password !== dto.confirmPassword) {
      throw new ServiceWarning('两次输入的密码不一致');
    }
    if (!isStrongPassword(dto.password)) {
      throw new ServiceWarning('密码必须包含字母和数字');
    }
    const phone = dto.phone?.trim();
    if (phone && !PHONE_RULE.test(phone)) {
      throw new ServiceWarning('手机号格式不正确');
    }
    if (!(await this.sysConfig.isRegisterEnabled())) {
      throw new ServiceWarning('当前系统没有开启注册功能！');
    }
    const userName = dto.userName.trim();
    return this.appUserService.create(
      {
        userName,
        nickName: dto.nickName?.trim() || userName,
        password: dto.password,
        email: dto.email,
        phone,
      },
      userName,
    );
  }

  async refresh(current: AppLoginUser): Promise<AppLoginResp> {
    const user = await this.appUserService.findById(current.userId);
    if (!user) throw new ServiceWarning('用户不存在');
    if (user.status !== '0') throw new ServiceWarning('用户已被停用');
    return this.issue(user);
  }

  profile(current: AppLoginUser): Promise<AppUserDetailResp> {
    return this.appUserService.detail(current.userId);
  }

  /** 模拟发送短信验证码，写入 sms_code:{phone}。 */
  async sendSmsCode(phone: string): Promise<{ code: string }> {
    const target = phone.trim();
    if (!PHONE_RULE.test(target)) {
      throw new ServiceWarning('手机号格式不正确');
    }
    await this.redis.run(
      '保存短信验证码',
      (client) => client.setex(`${RedisKeys.SMS_CODE.key}:${target}`, SMS_CODE_TTL, MOCK_SMS_CODE),
      null,
    );
    return { code: MOCK_SMS_CODE };
  }

  private async authenticate(account: string, password: string): Promise<AppUser> {
    const user = await this.appUserService.findByAccount(account);
    if (!user || !(await this.passwordService.verify(password, user.password))) {
      throw new ServiceWarning('用户名或密码错误');
    }
    if (user.status !== '0') {
      throw new ServiceWarning('用户已被停用');
    }
    return user;
  }

  private issue(user: AppUser): AppLoginResp {
    return {
      accessToken: this.tokenService.generate(user.userId, user.userName),
      tokenType: 'bearer',
      expiresIn: this.tokenService.expireSeconds,
      userInfo: toAppUserResp(user),
    };
  }
}
