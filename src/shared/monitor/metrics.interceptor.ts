import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Observable, from, throwError } from 'rxjs';
import { catchError, mergeMap } from 'rxjs/operators';
import { MetricsRecorder } from './metrics.recorder';
import {
  ERROR_RATE_KEY,
  ErrorRateOptions,
  MONITOR_PERFORMANCE_KEY,
  MonitorPerformanceOptions,
  TRACK_METRIC_KEY,
  TrackMetricOptions,
} from './monitor.decorators';

interface MonitorTargets {
  performance?: MonitorPerformanceOptions;
  metric?: TrackMetricOptions;
  errorRate?: ErrorRateOptions;
}

/**
 * 统一处理 @MonitorPerformance / @TrackMetric / @ErrorRate。
 * 指标写完后再返回结果；异常在记录后原样抛出。
 */
@Injectable()
export class MetricsInterceptor implements NestInterceptor {
  constructor(
    private readonly reflector: Reflector,
    private readonly recorder: MetricsRecorder,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const handler = context.getHandler();
    const targets: MonitorTargets = {
      performance: this.reflector.get<MonitorPerformanceOptions | undefined>(MONITOR_PERFORMANCE_KEY, handler),
      metric: this.reflector.get<TrackMetricOptions | undefined>(TRACK_METRIC_KEY, handler),
      errorRate: this.reflector.get<ErrorRateOptions | undefined>(ERROR_RATE_KEY, handler),
    };
    if (!targets.performance && !targets.metric && !targets.errorRate) {
      return next.handle();
    }
    const start = Date.now();
    return next.handle().pipe(
      mergeMap((result: unknown) =>
        from(this.afterSuccess(targets, Date.now() - start).then(() => result)),
      ),
      catchError((err: unknown) =>
        from(this.afterFailure(targets, Date.now() - start, err)).pipe(
          mergeMap(() => throwError(() => err)),
        ),
      ),
    );
  }

  private async afterSuccess(targets: MonitorTargets, elapsed: number): Promise<void> {
    const { performance, metric, errorRate } = targets;
    if (performance) {
      await this.recorder.recordPerformance(performance.operation, elapsed, true);
      const threshold = performance.thresholdMs ?? 1000;
      if (performance.alertOnSlow !== false && elapsed > threshold) {
        await this.recorder.slowOperation(performance.operation, elapsed, threshold);
      }
    }
    if (metric) {
      await this.recorder.recordBusiness(metric.name, metric.increment ?? 1, metric.tags);
    }
    if (errorRate) {
      await this.recorder.recordOutcome(errorRate.operation, true, errorRate.windowSize ?? 100);
    }
  }

  private async afterFailure(targets: MonitorTargets, elapsed: number, err: unknown): Promise<void> {
    const { performance, metric, errorRate } = targets;
    if (performance) {
      await this.recorder.recordPerformance(performance.operation, elapsed, false);
      const message = err instanceof Error ? err.message : String(err);
      await this.recorder.exception(performance.operation, elapsed, message);
    }
    if (metric) {
      await this.recorder.recordBusiness(`${metric.name}_failed`, metric.increment ?? 1, metric.tags);
    }
    if (errorRate) {
      await this.recorder.recordOutcome(errorRate.operation, false, errorRate.windowSize ?? 100);
      const rate = await this.recorder.errorRate(errorRate.operation);
      const threshold = errorRate.threshold ?? 0.1;
      if (rate > threshold) {
        await this.recorder.errorRateExceeded(errorRate.operation, rate, threshold);
      }
    }
  }
}
