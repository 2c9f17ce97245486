import { SetMetadata } from '@nestjs/common';

export interface CacheableOptions {
  /** 键前缀，例如 app:user:list */
  prefix: string;
  /** 过期秒数 */
  ttl: number;
  /** 是否缓存 null / undefined 结果，默认 false */
  cacheNull?: boolean;
}

export type EvictMode = 'exact' | 'prefix' | 'suffix' | 'contains';

export interface CacheEvictOptions {
  pattern: string;
  mode?: EvictMode;
}

export const CACHEABLE_KEY = 'cache:cacheable';
export const CACHE_EVICT_KEY = 'cache:evict';

export const Cacheable = (options: CacheableOptions) => SetMetadata(CACHEABLE_KEY, options);

/** 处理成功后按模式清除缓存，可叠加多条。 */
export const CacheEvict = (...options: CacheEvictOptions[]) => SetMetadata(CACHE_EVICT_KEY, options);
