import { Controller, Delete, Get, Param, Query } from '@nestjs/common';
import { ok } from '../../../shared/api-response/api-response';
import { LoginLogQueryDto } from '../../../shared/login-log/login-log';
import { parseIds } from '../../../shared/page/page';
import { RequirePermission } from '../../auth/login-user';
import { BusinessType, Log } from '../operlog/log.decorator';
import { LogininforService } from './logininfor.service';

@Controller('/monitor/logininfor')
export class LogininforController {
  constructor(private readonly logininforService: LogininforService) {}

  @Get('/list')
  @RequirePermission('monitor:logininfor:list')
  async list(@Query() query: LoginLogQueryDto) {
    return ok(await this.logininforService.page(query));
  }

  @Delete('/clean')
  @RequirePermission('monitor:logininfor:remove')
  @Log('登录日志', BusinessType.CLEAN)
  async clean() {
    await this.logininforService.clean();
    return ok(null);
  }

  @Delete('/:infoIds')
  @RequirePermission('monitor:logininfor:remove')
  @Log('登录日志', BusinessType.DELETE)
  async remove(@Param('infoIds') infoIds: string) {
    await this.logininforService.remove(parseIds(infoIds));
    return ok(null);
  }
}
