import { Controller, Delete, Get, Param, Query } from '@nestjs/common';
import { ok } from '../../../shared/api-response/api-response';
import { RequirePermission } from '../../auth/login-user';
import { BusinessType, Log } from '../operlog/log.decorator';
import { OnlineService } from './online.service';

/**
 * 在线用户：/monitor/online*
 */
@Controller('/monitor/online')
export class OnlineController {
  constructor(private readonly onlineService: OnlineService) {}

  @Get('/list')
  @RequirePermission('monitor:online:list')
  async list(@Query('ipaddr') ipaddr?: string, @Query('userName') userName?: string) {
    return ok(await this.onlineService.list({ ipaddr, userName }));
  }

  @Delete('/:tokenIds')
  @RequirePermission('monitor:online:forceLogout')
  @Log('在线用户', BusinessType.FORCE)
  async forceLogout(@Param('tokenIds') tokenIds: string) {
    await this.onlineService.forceLogout(tokenIds);
    return ok(null, '强退成功');
  }
}
