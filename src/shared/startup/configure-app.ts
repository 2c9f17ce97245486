import { INestApplication, ValidationPipe } from '@nestjs/common';
import { GlobalExceptionFilter } from '../exception/exception.filter';

/**
 * 应用级管道与过滤器，启动入口与端到端测试共用。
 */
export function configureApp(app: INestApplication): INestApplication {
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.useGlobalFilters(new GlobalExceptionFilter());
  app.enableCors({
    origin: true,
    credentials: true,
    allowedHeaders: 'Content-Type, Authorization, X-Requested-With',
    methods: 'GET,POST,PUT,DELETE,OPTIONS,PATCH',
  });
  return app;
}
