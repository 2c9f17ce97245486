import { Injectable } from '@nestjs/common';
import { RedisService } from '../../../shared/redis/redis.service';
import { RedisKeys } from '../../../shared/redis/redis-keys';
import { TokenService } from '../jwt/jwt.service';

export interface OnlineSession {
  tokenId: string;
  userName: string;
  deptName: string;
  ipaddr: string;
  loginLocation: string;
  browser: string;
  os: string;
  loginTime: string;
}

function sessionKey(sessionId: string): string {
  return `${RedisKeys.ACCESS_TOKEN.key}:${sessionId}`;
}

/**
 * 登录会话存储：access_token:{session_id} -> token，TTL 与 token 有效期一致。
 */
@Injectable()
export class SessionService {
  constructor(
    private readonly redis: RedisService,
    private readonly tokenService: TokenService,
  ) {}

  async save(sessionId: string, token: string): Promise<void> {
    await this.redis.run(
      '保存登录会话',
      (client) =>
        client.setex(sessionKey(sessionId), this.tokenService.expireSeconds, token),
      null,
    );
  }

  /** Redis 不可用时仅依赖 token 自身的签名与有效期。 */
  async isActive(sessionId: string): Promise<boolean> {
    return this.redis.run(
      '校验登录会话',
      async (client) => (await client.exists(sessionKey(sessionId))) === 1,
      true,
    );
  }

  async remove(sessionIds: string[]): Promise<number> {
    const keys = sessionIds.filter((s) => s).map(sessionKey);
    if (!keys.length) return 0;
    return this.redis.run('删除登录会话', (client) => client.del(...keys), 0);
  }

  /**
   * 扫描全部 access_token:* 键并解码 token，解码失败的记录跳过。
   */
  async listOnline(): Promise<OnlineSession[]> {
    const tokens = await this.redis.run(
      '查询在线用户',
      async (client) => {
        const keys = await client.keys(`${RedisKeys.ACCESS_TOKEN.key}:*`);
        const values: string[] = [];
        for (const key of keys) {
          const v = await client.get(key);
          if (v) values.push(v);
        }
        return values;
      },
      [],
    );
    const sessions: OnlineSession[] = [];
    for (const token of tokens) {
      const claims = this.tokenService.decode(token);
      if (!claims) continue;
      sessions.push({
        tokenId: claims.session_id,
        userName: claims.user_name,
        deptName: claims.dept_name,
        ipaddr: claims.login_info.ipaddr,
        loginLocation: claims.login_info.loginLocation,
        browser: claims.login_info.browser,
        os: claims.login_info.os,
        loginTime: claims.login_info.loginTime,
      });
    }
    return sessions.sort((a, b) => b.loginTime.localeCompare(a.loginTime));
  }
}
