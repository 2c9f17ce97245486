import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { AuthException, PermissionException } from '../../shared/exception/exceptions';
import { ALL_PERMISSION, MenuService } from '../system/menu/menu.service';
import { AppTokenService, TokenService } from './jwt/jwt.service';
import {
  AUTH_SCOPE_KEY,
  AuthScope,
  IS_PUBLIC_KEY,
  PERMISSIONS_KEY,
  setAppLoginUser,
  setLoginUser,
} from './login-user';
import { SessionService } from './session/session.service';

/**
 * 全局鉴权守卫。
 * 默认校验管理端 token 与 Redis 会话；@AppAuth() 的接口改用 App 端 token；
 * @RequirePermission 的接口再校验菜单权限标识。
 */
@Injectable()
export class AuthGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly tokenService: TokenService,
    private readonly appTokenService: AppTokenService,
    private readonly sessionService: SessionService,
    private readonly menuService: MenuService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    if (context.getType() !== 'http') return true;
    const targets = [context.getHandler(), context.getClass()];
    if (this.reflector.getAllAndOverride<boolean | undefined>(IS_PUBLIC_KEY, targets)) {
      return true;
    }
    const req = context.switchToHttp().getRequest<Request>();
    const authorization = req.headers.authorization;
    const scope =
      this.reflector.getAllAndOverride<AuthScope | undefined>(AUTH_SCOPE_KEY, targets) ?? 'admin';

    if (scope === 'app') {
      const claims = this.appTokenService.parse(authorization);
      if (!claims) throw new AuthException();
      setAppLoginUser(req, claims);
      return true;
    }

    const claims = this.tokenService.parse(authorization);
    if (!claims) throw new AuthException();
    if (!(await this.sessionService.isActive(claims.session_id))) {
      throw new AuthException('登录状态已过期');
    }
    setLoginUser(req, {
      userId: claims.user_id,
      userName: claims.user_name,
      deptName: claims.dept_name,
      sessionId: claims.session_id,
    });

    const required = this.reflector.getAllAndOverride<string[] | undefined>(PERMISSIONS_KEY, targets);
    if (required?.length) {
      const owned = await this.menuService.permissions(claims.user_id);
      if (!owned.includes(ALL_PERMISSION) && !required.some((p) => owned.includes(p))) {
        throw new PermissionException();
      }
    }
    return true;
  }
}
