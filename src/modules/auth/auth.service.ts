import { Injectable } from '@nestjs/common';
import { Request } from 'express';
import { randomUUID } from 'crypto';
import { AuthException, LoginException } from '../../shared/exception/exceptions';
import { clientInfo } from '../../shared/request/client-info';
import { SysConfigService } from '../../shared/sys-config/sys-config.service';
import { formatDateTime } from '../../shared/time/time';
import { CaptchaService } from '../captcha/captcha.service';
import { LogininforService } from '../monitor/logininfor/logininfor.service';
import { RouterVo } from '../system/menu/dto';
import { MenuService } from '../system/menu/menu.service';
import { RoleService } from '../system/role/role.service';
import { SUPER_ADMIN_ROLE_KEY } from '../system/role/role.entity';
import { SUPER_ADMIN_ID, SysUser } from '../system/user/user.entity';
import { UserService, toUserResp } from '../system/user/user.service';
import { LoginDto, UserInfoResp } from './dto/login.dto';
import { TokenService } from './jwt/jwt.service';
import { LoginUser } from './login-user';
import { PasswordService } from './security/password.service';
import { SessionService } from './session/session.service';

/**
 * 管理端登录、当前用户信息与路由。
 */
@Injectable()
export class AuthService {
  constructor(
    private readonly userService: UserService,
    private readonly roleService: RoleService,
    private readonly menuService: MenuService,
    private readonly passwordService: PasswordService,
    private readonly tokenService: TokenService,
    private readonly sessionService: SessionService,
    private readonly captchaService: CaptchaService,
    private readonly sysConfig: SysConfigService,
    private readonly logininforService: LogininforService,
  ) {}

  /**
   * 登录：验证码 → 账号密码 → 状态，失败与成功都写入登录日志。
   */
  async login(dto: LoginDto, req: Request): Promise<string> {
    const userName = dto.username.trim();
    let user: SysUser;
    try {
      user = await this.authenticate(dto, userName);
    } catch (err) {
      if (err instanceof LoginException) {
        await this.logininforService.record(req, userName, '1', err.message);
      }
      throw err;
    }

    const info = clientInfo(req);
    await this.userService.recordLogin(user.userId, info.ip);
    await this.logininforService.record(req, userName, '0', '登录成功');

    const sessionId = randomUUID();
    const token = this.tokenService.generate({
      user_id: user.userId,
      user_name: user.userName,
      dept_name: '',
      session_id: sessionId,
      login_info: {
        ipaddr: info.ip,
        loginLocation: info.location,
        browser: info.browser,
        os: info.os,
        loginTime: formatDateTime(new Date()),
      },
    });
    await this.sessionService.save(sessionId, token);
    return token;
  }

  async getInfo(user: LoginUser): Promise<UserInfoResp> {
    const sysUser = await this.userService.findById(user.userId);
    if (!sysUser) throw new AuthException('登录状态已过期');
    const roles =
      sysUser.userId === SUPER_ADMIN_ID
        ? [SUPER_ADMIN_ROLE_KEY]
        : await this.roleService.roleKeysOf(sysUser.userId);
    return {
      user: toUserResp(sysUser),
      roles,
      permissions: await this.menuService.permissions(sysUser.userId),
    };
  }

  getRouters(user: LoginUser): Promise<RouterVo[]> {
    return this.menuService.routers(user.userId);
  }

  /** 只有签名有效的 token 才会删除会话；无效 token 也视为退出成功。 */
  async logout(authorization?: string): Promise<void> {
    const claims = this.tokenService.parse(authorization);
    if (claims) {
      await this.sessionService.remove([claims.session_id]);
    }
  }

  private async authenticate(dto: LoginDto, userName: string): Promise<SysUser> {
    if (await this.sysConfig.isCaptchaEnabled()) {
      await this.captchaService.validate(dto.uuid, dto.code);
    }
    const user = await this.userService.findByUserName(userName);
    if (!user || !(await this.passwordService.verify(dto.password, user.password))) {
      throw new LoginException('用户不存在/密码错误');
    }
    if (user.status === '1') {
      throw new LoginException('用户已封禁，请联系管理员');
    }
    return user;
  }
}
