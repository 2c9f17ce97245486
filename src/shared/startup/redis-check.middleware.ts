import { Injectable, Logger, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { RedisService } from '../redis/redis.service';

/**
 * Redis 不可用时仅记录告警，请求继续以降级模式处理。
 */
@Injectable()
export class RedisCheckMiddleware implements NestMiddleware {
  private readonly logger = new Logger(RedisCheckMiddleware.name);

  constructor(private readonly redis: RedisService) {}

  use(req: Request, _res: Response, next: NextFunction): void {
    this.redis
      .getClient()
      .then((client) => {
        if (!client) {
          this.logger.warn(`Redis不可用，以降级模式处理请求: ${req.method} ${req.originalUrl}`);
        }
      })
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn(`Redis状态检查失败: ${message}`);
      })
      .finally(() => next());
  }
}
