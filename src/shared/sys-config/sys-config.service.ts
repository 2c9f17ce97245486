import { Injectable, Logger } from '@nestjs/common';
import { RedisService } from '../redis/redis.service';
import { RedisKeys } from '../redis/redis-keys';
import { SysConfigDao } from './sys-config.dao';

const CAPTCHA_ENABLED = 'sys.account.captchaEnabled';
const REGISTER_USER = 'sys.account.registerUser';

/**
 * 系统参数服务：优先读 Redis 中的 sys_config:{key}，缓存缺失时回退数据库。
 */
@Injectable()
export class SysConfigService {
  private readonly logger = new Logger(SysConfigService.name);

  constructor(
    private readonly dao: SysConfigDao,
    private readonly redis: RedisService,
  ) {}

  /**
   * 将 sys_config 全量写入 Redis，启动时与清空全部缓存后调用。
   */
  async loadConfigCache(): Promise<number> {
    const rows = await this.dao.listAll();
    return this.redis.run(
      '初始化参数缓存',
      async (client) => {
        for (const row of rows) {
          await client.set(
            `${RedisKeys.SYS_CONFIG.key}:${row.config_key}`,
            row.config_value,
          );
        }
        this.logger.log(`已加载 ${rows.length} 条系统参数到缓存`);
        return rows.length;
      },
      0,
    );
  }

  async getConfigValue(key: string): Promise<string | null> {
    const cached = await this.redis.run(
      '读取参数缓存',
      (client) => client.get(`${RedisKeys.SYS_CONFIG.key}:${key}`),
      null,
    );
    if (cached !== null) return cached;
    return this.dao.findValue(key);
  }

  /**
   * 布尔参数读取；Redis 与数据库都取不到时返回 fallback。
   */
  async getBoolean(key: string, fallback: boolean): Promise<boolean> {
    let value: string | null;
    try {
      value = await this.getConfigValue(key);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`读取参数 ${key} 失败: ${message}`);
      return fallback;
    }
    if (value === null || value === '') return fallback;
    return value.trim().toLowerCase() === 'true';
  }

  isCaptchaEnabled(): Promise<boolean> {
    return this.getBoolean(CAPTCHA_ENABLED, true);
  }

  isRegisterEnabled(): Promise<boolean> {
    return this.getBoolean(REGISTER_USER, true);
  }
}
