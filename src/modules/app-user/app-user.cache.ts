import { CacheEvictOptions } from '../../shared/cache/cache.decorators';

/** 管理端列表、详情与统计的缓存前缀，写操作成功后按前缀清除。 */
export const USER_CACHE: CacheEvictOptions = { pattern: 'app:user:', mode: 'prefix' };
export const STATS_CACHE: CacheEvictOptions = { pattern: 'app:stats:', mode: 'prefix' };
export const LOGIN_LOG_CACHE: CacheEvictOptions = { pattern: 'app:loginlog:', mode: 'prefix' };
