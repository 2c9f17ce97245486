import {
  CallHandler,
  ExecutionContext,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { Observable, from, of } from 'rxjs';
import { mergeMap } from 'rxjs/operators';
import { RedisService } from '../redis/redis.service';
import { asRecord } from '../util/record';
import { buildCacheKey, evictPattern } from './cache-key';
import {
  CACHEABLE_KEY,
  CACHE_EVICT_KEY,
  CacheEvictOptions,
  CacheableOptions,
} from './cache.decorators';

/**
 * @Cacheable：GET 命中直接返回，未命中执行后 SETEX。
 * @CacheEvict：处理成功后按模式删除键。
 * Redis 读写失败只记录告警，照常执行业务。
 */
@Injectable()
export class CacheInterceptor implements NestInterceptor {
  private readonly logger = new Logger(CacheInterceptor.name);

  constructor(
    private readonly reflector: Reflector,
    private readonly redis: RedisService,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const handler = context.getHandler();
    const cacheable = this.reflector.get<CacheableOptions | undefined>(CACHEABLE_KEY, handler);
    const evicts = this.reflector.get<CacheEvictOptions[] | undefined>(CACHE_EVICT_KEY, handler);
    if (context.getType() !== 'http' || (!cacheable && !evicts?.length)) {
      return next.handle();
    }

    if (cacheable) {
      const req = context.switchToHttp().getRequest<Request>();
      const key = buildCacheKey(
        cacheable.prefix,
        context.getClass().name,
        handler.name,
        Object.values(asRecord(req.params) ?? {}),
        { ...(asRecord(req.query) ?? {}), ...(asRecord(req.body) ?? {}) },
      );
      return from(this.read(key)).pipe(
        mergeMap((hit) => {
          if (hit.found) {
            this.logger.debug(`缓存命中: ${key}`);
            return of(hit.value);
          }
          return next.handle().pipe(
            mergeMap((result: unknown) => from(this.write(key, result, cacheable).then(() => result))),
          );
        }),
      );
    }

    return next.handle().pipe(
      mergeMap((result: unknown) => from(this.evict(evicts ?? []).then(() => result))),
    );
  }

  private async read(key: string): Promise<{ found: boolean; value: unknown }> {
    const raw = await this.redis.run('读取缓存', (client) => client.get(key), null);
    if (raw === null) return { found: false, value: undefined };
    try {
      return { found: true, value: JSON.parse(raw) };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`缓存数据解析失败 ${key}: ${message}`);
      return { found: false, value: undefined };
    }
  }

  private async write(key: string, value: unknown, options: CacheableOptions): Promise<void> {
    if ((value === null || value === undefined) && !options.cacheNull) return;
    const payload = JSON.stringify(value ?? null);
    await this.redis.run('写入缓存', (client) => client.setex(key, options.ttl, payload), null);
  }

  async evict(evicts: CacheEvictOptions[]): Promise<number> {
    let removed = 0;
    for (const option of evicts) {
      const pattern = evictPattern(option.pattern, option.mode);
      removed += await this.redis.run(
        '清除缓存',
        async (client) => {
          const keys = (option.mode ?? 'exact') === 'exact' ? [pattern] : await client.keys(pattern);
          return keys.length ? client.del(...keys) : 0;
        },
        0,
      );
    }
    return removed;
  }
}
