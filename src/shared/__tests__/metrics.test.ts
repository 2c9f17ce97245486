import { Controller, Get, INestApplication } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { FakeRedis } from '../../__tests__/support/fake-redis';
import { ok } from '../api-response/api-response';
import { ServiceWarning } from '../exception/exceptions';
import { MetricsInterceptor } from '../monitor/metrics.interceptor';
import {
  MetricsRecorder,
  alertKey,
  businessKey,
  errorRateKey,
  isFailureMember,
  performanceKey,
} from '../monitor/metrics.recorder';
import { ErrorRate, MonitorPerformance, TrackMetric } from '../monitor/monitor.decorators';
import { RedisService } from '../redis/redis.service';
import { configureApp } from '../startup/configure-app';

describe('metric keys', () => {
  it('appends tags to business keys', () => {
    expect(businessKey('login')).toBe('metrics:business:login');
    expect(businessKey('login', { source: 'mobile', os: 'ios' })).toBe(
      'metrics:business:login:source=mobile:os=ios',
    );
  });

  it('buckets alerts by day', () => {
    expect(alertKey('exception', new Date(2024, 0, 5, 13, 0, 0))).toBe('alerts:exception:20240105');
  });

  it('reads the outcome from the window member', () => {
    expect(isFailureMember('1700000000000:0:ab12cd34')).toBe(true);
    expect(isFailureMember('1700000000000:1:ab12cd34')).toBe(false);
  });
});

describe('MetricsRecorder', () => {
  let fake: FakeRedis;
  let recorder: MetricsRecorder;

  beforeEach(() => {
    fake = new FakeRedis();
    recorder = new MetricsRecorder(new RedisService(() => fake));
  });

  it('records execution time and counters', async () => {
    await recorder.recordPerformance('op', 12, true);
    await recorder.recordPerformance('op', 30, false);
    const times = await fake.zrangeWithScores(`${performanceKey('op')}:execution_time`, 0, -1);
    expect(times.map((t) => t.score)).toEqual([12, 30]);
    expect(await fake.hgetall(`${performanceKey('op')}:counts`)).toEqual({
      total: '2',
      success: '1',
      failed: '1',
    });
    expect(await fake.ttl(`${performanceKey('op')}:counts`)).toBe(7 * 24 * 3600);
  });

  it('increments business metrics', async () => {
    await recorder.recordBusiness('signup', 2, { source: 'admin' });
    await recorder.recordBusiness('signup', 1, { source: 'admin' });
    const hash = await fake.hgetall('metrics:business:signup:source=admin');
    expect(hash.value).toBe('3');
    expect(hash.last_update).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('keeps only the latest window of outcomes', async () => {
    for (let i = 0; i < 5; i++) {
      await recorder.recordOutcome('op', true, 3);
    }
    expect(await fake.zrangeWithScores(errorRateKey('op'), 0, -1)).toHaveLength(3);
  });

  it('computes the error rate over the window', async () => {
    await recorder.recordOutcome('op', true, 100);
    await recorder.recordOutcome('op', false, 100);
    await recorder.recordOutcome('op', false, 100);
    await recorder.recordOutcome('op', true, 100);
    expect(await recorder.errorRate('op')).toBe(0.5);
  });

  it('reports a zero error rate without redis', async () => {
    fake.down = true;
    await recorder.recordOutcome('op', false, 100);
    expect(await recorder.errorRate('op')).toBe(0);
  });

  it('pushes alerts as JSON', async () => {
    await recorder.slowOperation('op', 1500, 1000);
    const [raw] = await fake.lrange(alertKey('slow_operation'), 0, -1);
    const alert: unknown = JSON.parse(raw);
    expect(alert).toMatchObject({
      type: 'slow_operation',
      operation: 'op',
      execution_time: 1500,
      threshold: 1000,
      message: '操作 op 执行时间 1500.00ms 超过阈值 1000ms',
    });
  });
});

@Controller('/sample')
class SampleController {
  @Get('/ok')
  @MonitorPerformance({ operation: 'sample', thresholdMs: -1 })
  @TrackMetric({ name: 'sample' })
  @ErrorRate({ operation: 'sample' })
  success() {
    return ok('pong');
  }

  @Get('/fail')
  @MonitorPerformance({ operation: 'sample', alertOnSlow: false })
  @TrackMetric({ name: 'sample' })
  @ErrorRate({ operation: 'sample', threshold: 0.4 })
  failure(): never {
    throw new ServiceWarning('探测失败');
  }
}

describe('MetricsInterceptor', () => {
  let app: INestApplication;
  let fake: FakeRedis;

  beforeEach(async () => {
    fake = new FakeRedis();
    const redis = new RedisService(() => fake);
    const moduleRef = await Test.createTestingModule({
      controllers: [SampleController],
      providers: [
        { provide: RedisService, useValue: redis },
        MetricsRecorder,
        { provide: APP_INTERCEPTOR, useClass: MetricsInterceptor },
      ],
    }).compile();
    app = configureApp(moduleRef.createNestApplication({ logger: false }));
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('records success metrics and slow alerts', async () => {
    const res = await request(app.getHttpServer()).get('/sample/ok').expect(200);
    expect(res.body.data).toBe('pong');
    expect(await fake.hgetall('metrics:performance:sample:counts')).toEqual({ total: '1', success: '1' });
    expect((await fake.hgetall('metrics:business:sample')).value).toBe('1');
    expect(await fake.lrange(alertKey('slow_operation'), 0, -1)).toHaveLength(1);
    const window = await fake.zrangeWithScores(errorRateKey('sample'), 0, -1);
    expect(window.map((m) => isFailureMember(m.member))).toEqual([false]);
  });

  it('records failures and raises the error-rate alert', async () => {
    await request(app.getHttpServer()).get('/sample/ok').expect(200);
    const res = await request(app.getHttpServer()).get('/sample/fail').expect(200);
    expect(res.body).toMatchObject({ code: 601, msg: '探测失败' });

    expect(await fake.hgetall('metrics:performance:sample:counts')).toEqual({
      total: '2',
      success: '1',
      failed: '1',
    });
    expect((await fake.hgetall('metrics:business:sample_failed')).value).toBe('1');
    const [exception] = await fake.lrange(alertKey('exception'), 0, -1);
    expect(JSON.parse(exception)).toMatchObject({ type: 'exception', error_message: '探测失败' });
    const [rateAlert] = await fake.lrange(alertKey('error_rate'), 0, -1);
    expect(JSON.parse(rateAlert)).toMatchObject({ type: 'error_rate', error_rate: 0.5, threshold: 0.4 });
  });

  it('still answers while redis is down', async () => {
    fake.down = true;
    const res = await request(app.getHttpServer()).get('/sample/ok').expect(200);
    expect(res.body.data).toBe('pong');
  });
});
