import { Injectable } from '@nestjs/common';
import * as jwt from 'jsonwebtoken';
import { adminTokenConfig, appTokenConfig, TokenConfig } from '../../../shared/config/env';
import { asRecord, readNumber, readString } from '../../../shared/util/record';

export interface LoginInfo {
  ipaddr: string;
  loginLocation: string;
  browser: string;
  os: string;
  loginTime: string;
}

/**
 * 管理端 Token 载荷，session_id 对应 Redis 中的 access_token:{session_id}。
 */
export interface AdminTokenClaims {
  user_id: number;
  user_name: string;
  dept_name: string;
  session_id: string;
  login_info: LoginInfo;
}

/** App 端 Token 载荷，sub 为 app_user.user_id。 */
export interface AppTokenClaims {
  sub: string;
  user_name: string;
  type: 'app';
}

/**
 * 从 Authorization 头中取出 token，支持 `Bearer xxx` 形式。
 */
export function extractToken(authHeader?: string): string {
  let token = (authHeader ?? '').trim();
  if (token.toLowerCase().startsWith('bearer ')) {
    token = token.slice(7).trim();
  }
  return token;
}

function toLoginInfo(value: unknown): LoginInfo {
  const rec = asRecord(value) ?? {};
  return {
    ipaddr: readString(rec, 'ipaddr'),
    loginLocation: readString(rec, 'loginLocation'),
    browser: readString(rec, 'browser'),
    os: readString(rec, 'os'),
    loginTime: readString(rec, 'loginTime'),
  };
}

export function toAdminClaims(payload: unknown): AdminTokenClaims | null {
  const rec = asRecord(payload);
  if (!rec) return null;
  const userId = readNumber(rec, 'user_id');
  const sessionId = readString(rec, 'session_id');
  if (userId === null || !sessionId) return null;
  return {
    user_id: userId,
    user_name: readString(rec, 'user_name'),
    dept_name: readString(rec, 'dept_name'),
    session_id: sessionId,
    login_info: toLoginInfo(rec.login_info),
  };
}

function toAppClaims(payload: unknown): AppTokenClaims | null {
  const rec = asRecord(payload);
  if (!rec || rec.type !== 'app') return null;
  const sub = readString(rec, 'sub');
  if (!sub) return null;
  return { sub, user_name: readString(rec, 'user_name'), type: 'app' };
}

function verify(token: string, cfg: TokenConfig): unknown {
  if (!token) return null;
  try {
    return jwt.verify(token, cfg.secret, { algorithms: ['HS256'] });
  } catch {
    return null;
  }
}

/**
 * 管理端 Token 签发与解析。
 */
@Injectable()
export class TokenService {
  get expireSeconds(): number {
    return adminTokenConfig().expireMinutes * 60;
  }

  generate(claims: AdminTokenClaims): string {
    return jwt.sign({ ...claims }, adminTokenConfig().secret, {
      algorithm: 'HS256',
      expiresIn: this.expireSeconds,
    });
  }

  /** 校验签名与有效期，失败返回 null。 */
  parse(authHeader?: string): AdminTokenClaims | null {
    return toAdminClaims(verify(extractToken(authHeader), adminTokenConfig()));
  }

  /** 仅解码不校验，用于在线用户列表。 */
  decode(token: string): AdminTokenClaims | null {
    return toAdminClaims(jwt.decode(token));
  }
}

/**
 * App 端 Token 签发与解析，与管理端使用不同的密钥。
 */
@Injectable()
export class AppTokenService {
  get expireSeconds(): number {
    return appTokenConfig().expireMinutes * 60;
  }

  generate(userId: number, userName: string): string {
    const claims: AppTokenClaims = {
      sub: String(userId),
      user_name: userName,
      type: 'app',
    };
    return jwt.sign(claims, appTokenConfig().secret, {
      algorithm: 'HS256',
      expiresIn: this.expireSeconds,
    });
  }

  parse(authHeader?: string): AppTokenClaims | null {
    return toAppClaims(verify(extractToken(authHeader), appTokenConfig()));
  }
}
