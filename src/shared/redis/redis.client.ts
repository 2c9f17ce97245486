import { Logger } from '@nestjs/common';
import Redis from 'ioredis';
import { RedisConfig } from '../config/env';

export interface ScoredMember {
  member: string;
  score: number;
}

/**
 * 业务代码依赖的 Redis 命令子集。
 */
export interface RedisClient {
  ping(): Promise<string>;
  get(key: string): Promise<string | null>;
  /** 读取并删除，Redis 6.2+ */
  getdel(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  exists(key: string): Promise<number>;
  keys(pattern: string): Promise<string[]>;
  expire(key: string, seconds: number): Promise<number>;
  ttl(key: string): Promise<number>;
  hincrby(key: string, field: string, increment: number): Promise<number>;
  hset(key: string, field: string, value: string): Promise<number>;
  hgetall(key: string): Promise<Record<string, string>>;
  lpush(key: string, value: string): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  zadd(key: string, score: number, member: string): Promise<unknown>;
  zremrangebyrank(key: string, start: number, stop: number): Promise<number>;
  zrangeWithScores(key: string, start: number, stop: number): Promise<ScoredMember[]>;
  info(section?: string): Promise<string>;
  dbsize(): Promise<number>;
  flushdb(): Promise<unknown>;
}

export interface RedisConnection extends RedisClient {
  connect(): Promise<void>;
  disconnect(): void;
}

const logger = new Logger('RedisClient');

export type RedisConnectionFactory = (config: RedisConfig) => RedisConnection;

/**
 * 基于 ioredis 的连接实现：lazyConnect，不排队离线命令，不自动重连，
 * 由 RedisService 在下一次取用时重新建立。
 */
export function createIoRedisConnection(config: RedisConfig): RedisConnection {
  const redis = new Redis({
    host: config.host,
    port: config.port,
    password: config.password,
    db: config.db,
    lazyConnect: true,
    connectTimeout: 2000,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    retryStrategy: () => null,
  });
  redis.on('error', (err: Error) => {
    logger.debug(`ioredis: ${err.message}`);
  });
  return {
    connect: () => redis.connect(),
    disconnect: () => redis.disconnect(),
    ping: () => redis.ping(),
    get: (key) => redis.get(key),
    getdel: (key) => redis.getdel(key),
    set: (key, value) => redis.set(key, value),
    setex: (key, seconds, value) => redis.setex(key, seconds, value),
    del: (...keys) => redis.del(...keys),
    exists: (key) => redis.exists(key),
    keys: (pattern) => redis.keys(pattern),
    expire: (key, seconds) => redis.expire(key, seconds),
    ttl: (key) => redis.ttl(key),
    hincrby: (key, field, increment) => redis.hincrby(key, field, increment),
    hset: (key, field, value) => redis.hset(key, field, value),
    hgetall: (key) => redis.hgetall(key),
    lpush: (key, value) => redis.lpush(key, value),
    lrange: (key, start, stop) => redis.lrange(key, start, stop),
    zadd: (key, score, member) => redis.zadd(key, score, member),
    zremrangebyrank: (key, start, stop) =>
      redis.zremrangebyrank(key, start, stop),
    zrangeWithScores: async (key, start, stop) => {
      const flat = await redis.zrange(key, start, stop, 'WITHSCORES');
      const out: ScoredMember[] = [];
      for (let i = 0; i + 1 < flat.length; i += 2) {
        out.push({ member: flat[i], score: Number(flat[i + 1]) });
      }
      return out;
    },
    info: (section) => (section ? redis.info(section) : redis.info()),
    dbsize: () => redis.dbsize(),
    flushdb: () => redis.flushdb(),
  };
}
