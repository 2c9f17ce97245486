import { Injectable } from '@nestjs/common';
import { RedisKeys } from '../../../shared/redis/redis-keys';
import { RedisService } from '../../../shared/redis/redis.service';
import { SysConfigService } from '../../../shared/sys-config/sys-config.service';

export interface CommandStat {
  name: string;
  value: string;
}

export interface CacheMonitorResp {
  info: Record<string, string>;
  dbSize: number;
  commandStats: CommandStat[];
}

export interface CacheInfo {
  cacheName: string;
  cacheKey: string;
  cacheValue: string | null;
  remark: string;
}

const UNAVAILABLE = '（Redis不可用）';

/** 解析 INFO 输出的 `key:value` 行，忽略注释与空行。 */
export function parseRedisInfo(raw: string): Record<string, string> {
  const info: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    if (!line || line.startsWith('#')) continue;
    const idx = line.indexOf(':');
    if (idx <= 0) continue;
    info[line.slice(0, idx)] = line.slice(idx + 1).trim();
  }
  return info;
}

/** `cmdstat_get:calls=2,usec=...` → `{name: 'get', value: '2'}` */
export function parseCommandStats(raw: string): CommandStat[] {
  return Object.entries(parseRedisInfo(raw))
    .filter(([key]) => key.startsWith('cmdstat_'))
    .map(([key, value]) => {
      const calls = /(?:^|,)calls=(\d+)/.exec(value);
      return { name: key.slice('cmdstat_'.length), value: calls ? calls[1] : '0' };
    });
}

/**
 * 缓存监控。Redis 不可用时读接口返回默认值，清理接口照常返回成功并标注。
 */
@Injectable()
export class CacheService {
  constructor(
    private readonly redis: RedisService,
    private readonly sysConfig: SysConfigService,
  ) {}

  async statistics(): Promise<CacheMonitorResp> {
    return this.redis.run(
      '获取缓存监控信息',
      async (client) => ({
        info: parseRedisInfo(await client.info()),
        dbSize: await client.dbsize(),
        commandStats: parseCommandStats(await client.info('commandstats')),
      }),
      { info: {}, dbSize: 0, commandStats: [] },
    );
  }

  names(): CacheInfo[] {
    return Object.values(RedisKeys).map((k) => ({
      cacheName: k.key,
      cacheKey: '',
      cacheValue: '',
      remark: k.remark,
    }));
  }

  async keys(cacheName: string): Promise<string[]> {
    const keys = await this.redis.run('获取缓存键列表', (client) => client.keys(`${cacheName}*`), []);
    const prefix = `${cacheName}:`;
    return keys.filter((k) => k.startsWith(prefix)).map((k) => k.slice(prefix.length));
  }

  async value(cacheName: string, cacheKey: string): Promise<CacheInfo> {
    const client = await this.redis.getClient();
    if (!client) {
      return { cacheName, cacheKey, cacheValue: null, remark: 'Redis不可用' };
    }
    const cacheValue = await this.redis.run(
      '获取缓存值',
      (c) => c.get(`${cacheName}:${cacheKey}`),
      null,
    );
    return { cacheName, cacheKey, cacheValue, remark: '' };
  }

  async clearCacheName(cacheName: string): Promise<string> {
    return this.clear(`${cacheName}*`, `${cacheName}对应键值清除成功`);
  }

  async clearCacheKey(cacheKey: string): Promise<string> {
    return this.clear(`*${cacheKey}`, `${cacheKey}清除成功`);
  }

  /** 清空当前库后重新加载系统参数缓存。 */
  async clearAll(): Promise<string> {
    const flushed = await this.redis.run(
      '清除全部缓存',
      async (client) => {
        await client.flushdb();
        return true;
      },
      false,
    );
    if (!flushed) return `所有缓存清除成功${UNAVAILABLE}`;
    await this.sysConfig.loadConfigCache();
    return '所有缓存清除成功';
  }

  private async clear(pattern: string, message: string): Promise<string> {
    const cleared = await this.redis.run(
      '清除缓存',
      async (client) => {
        const keys = await client.keys(pattern);
        if (keys.length) await client.del(...keys);
        return true;
      },
      false,
    );
    return cleared ? message : `${message}${UNAVAILABLE}`;
  }
}
