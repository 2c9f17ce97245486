import {
  ExecutionContext,
  SetMetadata,
  createParamDecorator,
} from '@nestjs/common';
import { Request } from 'express';
import { AuthException } from '../../shared/exception/exceptions';
import { AppTokenClaims } from './jwt/jwt.service';

/**
 * 当前管理端登录用户。
 */
export interface LoginUser {
  userId: number;
  userName: string;
  deptName: string;
  sessionId: string;
}

/** 当前 App 端登录用户。 */
export interface AppLoginUser {
  userId: number;
  userName: string;
}

export const IS_PUBLIC_KEY = 'auth:isPublic';
export const AUTH_SCOPE_KEY = 'auth:scope';
export const PERMISSIONS_KEY = 'auth:permissions';

export type AuthScope = 'admin' | 'app';

/** 标记无需登录即可访问的接口。 */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);

/** 标记使用 App 端 token 的控制器或接口。 */
export const AppAuth = () => SetMetadata(AUTH_SCOPE_KEY, 'app');

/** 接口所需权限标识，满足任意一个即可。 */
export const RequirePermission = (...permissions: string[]) =>
  SetMetadata(PERMISSIONS_KEY, permissions);

const loginUsers = new WeakMap<Request, LoginUser>();
const appLoginUsers = new WeakMap<Request, AppLoginUser>();

export function setLoginUser(req: Request, user: LoginUser): void {
  loginUsers.set(req, user);
}

export function getLoginUser(req: Request): LoginUser | undefined {
  return loginUsers.get(req);
}

export function setAppLoginUser(req: Request, claims: AppTokenClaims): void {
  appLoginUsers.set(req, { userId: Number(claims.sub), userName: claims.user_name });
}

export function getAppLoginUser(req: Request): AppLoginUser | undefined {
  return appLoginUsers.get(req);
}

/**
 * 注入当前管理端用户：controllerMethod(@CurrentUser() user: LoginUser)
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): LoginUser => {
    const user = getLoginUser(ctx.switchToHttp().getRequest<Request>());
    if (!user) throw new AuthException();
    return user;
  },
);

export const CurrentAppUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AppLoginUser => {
    const user = getAppLoginUser(ctx.switchToHttp().getRequest<Request>());
    if (!user) throw new AuthException();
    return user;
  },
);
