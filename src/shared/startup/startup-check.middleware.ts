import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { fail } from '../api-response/api-response';
import { StartupState } from './startup-state';

const SERVICE_UNAVAILABLE = 503;

@Injectable()
export class StartupCheckMiddleware implements NestMiddleware {
  constructor(private readonly state: StartupState) {}

  use(_req: Request, res: Response, next: NextFunction): void {
    if (!this.state.isReady()) {
      res.status(SERVICE_UNAVAILABLE).json(fail(SERVICE_UNAVAILABLE, '服务正在启动中，请稍后重试'));
      return;
    }
    next();
  }
}
