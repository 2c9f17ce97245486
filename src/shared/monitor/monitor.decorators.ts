import { SetMetadata } from '@nestjs/common';

export interface MonitorPerformanceOptions {
  operation: string;
  /** 慢操作阈值（毫秒），默认 1000。 */
  thresholdMs?: number;
  /** 超过阈值时是否写入告警，默认 true。 */
  alertOnSlow?: boolean;
}

export interface TrackMetricOptions {
  name: string;
  increment?: number;
  tags?: Record<string, string>;
}

export interface ErrorRateOptions {
  operation: string;
  /** 错误率阈值（0-1），默认 0.1。 */
  threshold?: number;
  /** 滑动窗口大小，默认 100。 */
  windowSize?: number;
}

export const MONITOR_PERFORMANCE_KEY = 'monitor:performance';
export const TRACK_METRIC_KEY = 'monitor:metric';
export const ERROR_RATE_KEY = 'monitor:errorRate';

/** 用户类操作的慢阈值。 */
export const USER_OPERATION_THRESHOLD_MS = 500;
/** 登录类操作的慢阈值。 */
export const LOGIN_OPERATION_THRESHOLD_MS = 2000;
/** 统计类操作的慢阈值。 */
export const STATS_OPERATION_THRESHOLD_MS = 1000;

export const MonitorPerformance = (options: MonitorPerformanceOptions) =>
  SetMetadata(MONITOR_PERFORMANCE_KEY, options);

export const TrackMetric = (options: TrackMetricOptions) =>
  SetMetadata(TRACK_METRIC_KEY, options);

export const ErrorRate = (options: ErrorRateOptions) =>
  SetMetadata(ERROR_RATE_KEY, options);

export const MonitorUserOperation = (operation: string) =>
  MonitorPerformance({ operation, thresholdMs: USER_OPERATION_THRESHOLD_MS });

export const MonitorLoginOperation = (operation: string) =>
  MonitorPerformance({ operation, thresholdMs: LOGIN_OPERATION_THRESHOLD_MS });

export const MonitorStatsOperation = (operation: string) =>
  MonitorPerformance({ operation, thresholdMs: STATS_OPERATION_THRESHOLD_MS });
