import { randomBytes } from 'crypto';
import { Injectable, Logger } from '@nestjs/common';
import { RedisService } from '../redis/redis.service';
import { compactDate } from '../time/time';

const DAY_SECONDS = 24 * 3600;
const PERFORMANCE_TTL = 7 * DAY_SECONDS;
const BUSINESS_TTL = 30 * DAY_SECONDS;

export type AlertType = 'slow_operation' | 'exception' | 'error_rate';

export function performanceKey(operation: string): string {
  return `metrics:performance:${operation}`;
}

export function businessKey(name: string, tags?: Record<string, string>): string {
  const tagStr = Object.entries(tags ?? {})
    .map(([k, v]) => `${k}=${v}`)
    .join(':');
  return tagStr ? `metrics:business:${name}:${tagStr}` : `metrics:business:${name}`;
}

export function errorRateKey(operation: string): string {
  return `metrics:error_rate:${operation}`;
}

export function alertKey(type: AlertType, date: Date = new Date()): string {
  return `alerts:${type}:${compactDate(date)}`;
}

/**
 * 窗口成员格式为 `${timestamp}:${1|0}:${随机串}`，第二段 0 表示失败。
 */
export function isFailureMember(member: string): boolean {
  return member.split(':')[1] === '0';
}

/**
 * 监控指标写入 Redis。所有写入失败均只记录告警日志。
 */
@Injectable()
export class MetricsRecorder {
  private readonly logger = new Logger(MetricsRecorder.name);

  constructor(private readonly redis: RedisService) {}

  async recordPerformance(operation: string, elapsedMs: number, success: boolean): Promise<void> {
    const key = performanceKey(operation);
    await this.redis.run(
      '记录性能指标',
      async (client) => {
        // 同一毫秒内的多次调用需保留为不同成员
        const member = `${new Date().toISOString()}#${randomBytes(2).toString('hex')}`;
        await client.zadd(`${key}:execution_time`, elapsedMs, member);
        await client.hincrby(`${key}:counts`, 'total', 1);
        await client.hincrby(`${key}:counts`, success ? 'success' : 'failed', 1);
        await client.expire(`${key}:execution_time`, PERFORMANCE_TTL);
        await client.expire(`${key}:counts`, PERFORMANCE_TTL);
      },
      undefined,
    );
  }

  async recordBusiness(name: string, increment = 1, tags?: Record<string, string>): Promise<void> {
    const key = businessKey(name, tags);
    await this.redis.run(
      '记录业务指标',
      async (client) => {
        await client.hincrby(key, 'value', increment);
        await client.hset(key, 'last_update', new Date().toISOString());
        await client.expire(key, BUSINESS_TTL);
      },
      undefined,
    );
  }

  /**
   * 将一次结果写入滑动窗口，只保留最近 windowSize 条。
   */
  async recordOutcome(operation: string, success: boolean, windowSize: number): Promise<void> {
    const key = errorRateKey(operation);
    const now = Date.now();
    const member = `${now}:${success ? 1 : 0}:${randomBytes(4).toString('hex')}`;
    await this.redis.run(
      '记录操作结果',
      async (client) => {
        await client.zadd(key, now, member);
        await client.zremrangebyrank(key, 0, -windowSize - 1);
        await client.expire(key, DAY_SECONDS);
      },
      undefined,
    );
  }

  /** 当前窗口内的错误率，无数据或 Redis 不可用时为 0。 */
  async errorRate(operation: string): Promise<number> {
    const members = await this.redis.run(
      '检查错误率',
      (client) => client.zrangeWithScores(errorRateKey(operation), 0, -1),
      [],
    );
    if (!members.length) return 0;
    const failed = members.filter((m) => isFailureMember(m.member)).length;
    return failed / members.length;
  }

  async alert(type: AlertType, operation: string, fields: Record<string, unknown>, message: string): Promise<void> {
    const key = alertKey(type);
    const payload = JSON.stringify({
      type,
      operation,
      ...fields,
      timestamp: new Date().toISOString(),
      message,
    });
    await this.redis.run(
      '发送监控告警',
      async (client) => {
        await client.lpush(key, payload);
        await client.expire(key, DAY_SECONDS);
      },
      undefined,
    );
  }

  async slowOperation(operation: string, elapsedMs: number, thresholdMs: number): Promise<void> {
    const message = `操作 ${operation} 执行时间 ${elapsedMs.toFixed(2)}ms 超过阈值 ${thresholdMs}ms`;
    this.logger.warn(`慢操作告警: ${message}`);
    await this.alert('slow_operation', operation, { execution_time: elapsedMs, threshold: thresholdMs }, message);
  }

  async exception(operation: string, elapsedMs: number, errorMessage: string): Promise<void> {
    this.logger.error(`操作失败: ${operation} 执行时间 ${elapsedMs.toFixed(2)}ms, 错误: ${errorMessage}`);
    await this.alert(
      'exception',
      operation,
      { execution_time: elapsedMs, error_message: errorMessage },
      `操作 ${operation} 执行失败: ${errorMessage}`,
    );
  }

  async errorRateExceeded(operation: string, rate: number, threshold: number): Promise<void> {
    const message = `操作 ${operation} 错误率 ${(rate * 100).toFixed(2)}% 超过阈值 ${(threshold * 100).toFixed(2)}%`;
    this.logger.error(`错误率告警: ${message}`);
    await this.alert('error_rate', operation, { error_rate: rate, threshold }, message);
  }
}
