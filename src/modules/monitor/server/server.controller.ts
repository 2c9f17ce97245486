import { Controller, Get } from '@nestjs/common';
import { ok } from '../../../shared/api-response/api-response';
import { RequirePermission } from '../../auth/login-user';
import { ServerService } from './server.service';

@Controller('/monitor/server')
export class ServerController {
  constructor(private readonly serverService: ServerService) {}

  @Get()
  @RequirePermission('monitor:server:list')
  async info() {
    return ok(await this.serverService.info());
  }
}
