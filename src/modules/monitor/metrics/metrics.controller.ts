import { Controller, Get, Query } from '@nestjs/common';
import { ok } from '../../../shared/api-response/api-response';
import { RequirePermission } from '../../auth/login-user';
import { MetricsService } from './metrics.service';

@Controller('/monitor/metrics')
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  @Get()
  @RequirePermission('monitor:server:list')
  async query(
    @Query('operation') operation?: string,
    @Query('metric') metric?: string,
    @Query('date') date?: string,
  ) {
    return ok(await this.metricsService.query({ operation, metric, date }));
  }
}
