import { Global, Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { MetricsInterceptor } from './metrics.interceptor';
import { MetricsRecorder } from './metrics.recorder';

@Global()
@Module({
  providers: [
    MetricsRecorder,
    { provide: APP_INTERCEPTOR, useClass: MetricsInterceptor },
  ],
  exports: [MetricsRecorder],
})
export class MetricsModule {}
