import { Injectable } from '@nestjs/common';
import {
  AlertType,
  MetricsRecorder,
  alertKey,
  businessKey,
  performanceKey,
} from '../../../shared/monitor/metrics.recorder';
import { RedisService } from '../../../shared/redis/redis.service';

export interface PerformanceSummary {
  operation: string;
  total: number;
  success: number;
  failed: number;
  samples: number;
  avgMs: number;
  maxMs: number;
  errorRate: number;
}

export interface MetricsResp {
  performance: PerformanceSummary | null;
  business: Record<string, string> | null;
  alerts: Record<AlertType, unknown[]>;
}

export interface MetricsQuery {
  operation?: string;
  metric?: string;
  /** YYYY-MM-DD 或 YYYYMMDD，默认当天 */
  date?: string;
}

const ALERT_TYPES: AlertType[] = ['slow_operation', 'exception', 'error_rate'];
const MAX_ALERTS = 100;

function parseAlert(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function toDate(value: string | undefined): Date {
  const digits = (value ?? '').replace(/-/g, '');
  if (!/^\d{8}$/.test(digits)) return new Date();
  const d = new Date(Number(digits.slice(0, 4)), Number(digits.slice(4, 6)) - 1, Number(digits.slice(6, 8)));
  return Number.isNaN(d.getTime()) ? new Date() : d;
}

/**
 * 读取监控拦截器写入 Redis 的指标与告警。
 */
@Injectable()
export class MetricsService {
  constructor(
    private readonly redis: RedisService,
    private readonly recorder: MetricsRecorder,
  ) {}

  async query(query: MetricsQuery): Promise<MetricsResp> {
    const operation = query.operation?.trim();
    const metric = query.metric?.trim();
    return {
      performance: operation ? await this.performance(operation) : null,
      business: metric
        ? await this.redis.run('读取业务指标', (c) => c.hgetall(businessKey(metric)), {})
        : null,
      alerts: await this.alerts(toDate(query.date)),
    };
  }

  async performance(operation: string): Promise<PerformanceSummary> {
    const key = performanceKey(operation);
    const counts = await this.redis.run('读取性能计数', (c) => c.hgetall(`${key}:counts`), {});
    const samples = await this.redis.run(
      '读取执行耗时',
      (c) => c.zrangeWithScores(`${key}:execution_time`, 0, -1),
      [],
    );
    const scores = samples.map((s) => s.score);
    const sum = scores.reduce((a, b) => a + b, 0);
    return {
      operation,
      total: Number(counts.total ?? 0),
      success: Number(counts.success ?? 0),
      failed: Number(counts.failed ?? 0),
      samples: scores.length,
      avgMs: scores.length ? Math.round((sum / scores.length) * 100) / 100 : 0,
      maxMs: scores.length ? Math.max(...scores) : 0,
      errorRate: await this.recorder.errorRate(operation),
    };
  }

  private async alerts(date: Date): Promise<Record<AlertType, unknown[]>> {
    const result: Record<AlertType, unknown[]> = {
      slow_operation: [],
      exception: [],
      error_rate: [],
    };
    for (const type of ALERT_TYPES) {
      const rows = await this.redis.run(
        '读取监控告警',
        (c) => c.lrange(alertKey(type, date), 0, MAX_ALERTS - 1),
        [],
      );
      result[type] = rows.map(parseAlert);
    }
    return result;
  }
}
