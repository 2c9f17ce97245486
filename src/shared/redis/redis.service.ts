import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  Optional,
} from '@nestjs/common';
import { redisConfig } from '../config/env';
import {
  RedisClient,
  RedisConnection,
  RedisConnectionFactory,
  createIoRedisConnection,
} from './redis.client';

export const REDIS_CONNECTION_FACTORY = 'REDIS_CONNECTION_FACTORY';

/**
 * Redis 连接持有者。
 *
 * - 首次取用时建立连接并 PING 校验；
 * - 校验或连接失败时丢弃连接、标记不可用，下一次取用再重试；
 * - 调用方拿到 null 时按降级逻辑处理（记录日志并返回默认数据）。
 */
@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private readonly factory: RedisConnectionFactory;
  private connection: RedisConnection | null = null;
  private connecting: Promise<RedisConnection | null> | null = null;
  private available = false;

  constructor(
    @Optional()
    @Inject(REDIS_CONNECTION_FACTORY)
    factory?: RedisConnectionFactory,
  ) {
    this.factory = factory ?? createIoRedisConnection;
  }

  isAvailable(): boolean {
    return this.available;
  }

  async getClient(): Promise<RedisClient | null> {
    const cfg = redisConfig();
    if (!cfg.enabled) {
      this.available = false;
      return null;
    }
    if (this.connection) {
      return this.connection;
    }
    // 并发请求共用同一次连接尝试
    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  /**
   * 显式校验连接是否可用，失败时丢弃现有连接。
   */
  async ping(): Promise<boolean> {
    const client = await this.getClient();
    if (!client) return false;
    try {
      await client.ping();
      return true;
    } catch (err) {
      this.drop(err);
      return false;
    }
  }

  /**
   * 在可用连接上执行命令；Redis 不可用或命令失败时记录日志并返回 fallback。
   */
  async run<T>(
    action: string,
    fn: (client: RedisClient) => Promise<T>,
    fallback: T,
  ): Promise<T> {
    const client = await this.getClient();
    if (!client) {
      this.logger.warn(`Redis不可用，跳过${action}`);
      return fallback;
    }
    try {
      return await fn(client);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`${action}失败: ${message}`);
      this.drop(err);
      return fallback;
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.connection) {
      this.connection.disconnect();
      this.connection = null;
    }
  }

  private async connect(): Promise<RedisConnection | null> {
    const conn = this.factory(redisConfig());
    try {
      await conn.connect();
      await conn.ping();
      this.connection = conn;
      if (!this.available) {
        this.logger.log('Redis 连接成功');
      }
      this.available = true;
      return conn;
    } catch (err) {
      conn.disconnect();
      this.drop(err);
      return null;
    }
  }

  private drop(err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    if (this.available || this.connection) {
      this.logger.warn(`Redis 连接不可用: ${message}`);
    } else {
      this.logger.debug(`Redis 连接失败: ${message}`);
    }
    if (this.connection) {
      this.connection.disconnect();
      this.connection = null;
    }
    this.available = false;
  }
}
