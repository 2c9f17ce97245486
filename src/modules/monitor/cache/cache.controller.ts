import { Controller, Delete, Get, Param } from '@nestjs/common';
import { ok } from '../../../shared/api-response/api-response';
import { RequirePermission } from '../../auth/login-user';
import { BusinessType, Log } from '../operlog/log.decorator';
import { CacheService } from './cache.service';

/**
 * 缓存监控：/monitor/cache*
 */
@Controller('/monitor/cache')
@RequirePermission('monitor:cache:list')
export class CacheController {
  constructor(private readonly cacheService: CacheService) {}

  @Get()
  async statistics() {
    return ok(await this.cacheService.statistics());
  }

  @Get('/getNames')
  names() {
    return ok(this.cacheService.names());
  }

  @Get('/getKeys/:cacheName')
  async keys(@Param('cacheName') cacheName: string) {
    return ok(await this.cacheService.keys(cacheName));
  }

  @Get('/getValue/:cacheName/:cacheKey')
  async value(@Param('cacheName') cacheName: string, @Param('cacheKey') cacheKey: string) {
    return ok(await this.cacheService.value(cacheName, cacheKey));
  }

  @Delete('/clearCacheName/:cacheName')
  @Log('缓存监控', BusinessType.CLEAN)
  async clearCacheName(@Param('cacheName') cacheName: string) {
    return ok(null, await this.cacheService.clearCacheName(cacheName));
  }

  @Delete('/clearCacheKey/:cacheKey')
  @Log('缓存监控', BusinessType.CLEAN)
  async clearCacheKey(@Param('cacheKey') cacheKey: string) {
    return ok(null, await this.cacheService.clearCacheKey(cacheKey));
  }

  @Delete('/clearCacheAll')
  @Log('缓存监控', BusinessType.CLEAN)
  async clearAll() {
    return ok(null, await this.cacheService.clearAll());
  }
}
