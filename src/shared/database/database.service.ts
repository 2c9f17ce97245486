import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { Pool, PoolClient, QueryResultRow } from 'pg';
import { databaseConfig } from '../config/env';

/**
 * 查询执行器，Pool 与事务中的 PoolClient 共用同一接口，DAO 只依赖它。
 */
export interface Queryable {
  query<R extends QueryResultRow>(
    sql: string,
    params?: unknown[],
  ): Promise<{ rows: R[]; rowCount: number | null }>;
}

/**
 * DatabaseService 封装 pg 连接池，统一管理连接生命周期。
 */
@Injectable()
export class DatabaseService implements Queryable, OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool: Pool;

  constructor() {
    const cfg = databaseConfig();
    this.pool = new Pool({
      connectionString: cfg.connectionString,
      max: cfg.max,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });
    this.pool.on('error', (err) => {
      this.logger.error(`数据库连接异常: ${err.message}`);
    });
  }

  async onModuleInit(): Promise<void> {
    await this.pool.query('SELECT 1');
    this.logger.log('数据库连接成功');
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }

  async query<R extends QueryResultRow>(
    sql: string,
    params: unknown[] = [],
  ): Promise<{ rows: R[]; rowCount: number | null }> {
    return this.pool.query<R>(sql, params);
  }

  /**
   * 在同一连接上执行事务，回调抛错时回滚。
   */
  async transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    const client: PoolClient = await this.pool.connect();
    try {
      const tx: Queryable = {
        query: <R extends QueryResultRow>(sql: string, params: unknown[] = []) =>
          client.query<R>(sql, params),
      };
      await client.query('BEGIN');
      const result = await fn(tx);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }
}
