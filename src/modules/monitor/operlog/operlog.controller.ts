import { Controller, Delete, Get, Param, ParseIntPipe, Query } from '@nestjs/common';
import { ok } from '../../../shared/api-response/api-response';
import { parseIds } from '../../../shared/page/page';
import { RequirePermission } from '../../auth/login-user';
import { OperLogQueryDto } from './dto';
import { BusinessType, Log } from './log.decorator';
import { OperLogService } from './operlog.service';

/**
 * 操作日志：/monitor/operlog*
 */
@Controller('/monitor/operlog')
export class OperLogController {
  constructor(private readonly operLogService: OperLogService) {}

  @Get('/list')
  @RequirePermission('monitor:operlog:list')
  async list(@Query() query: OperLogQueryDto) {
    return ok(await this.operLogService.page(query));
  }

  @Delete('/clean')
  @RequirePermission('monitor:operlog:remove')
  @Log('操作日志', BusinessType.CLEAN)
  async clean() {
    await this.operLogService.clean();
    return ok(null);
  }

  @Get('/:operId')
  @RequirePermission('monitor:operlog:query')
  async get(@Param('operId', ParseIntPipe) operId: number) {
    return ok(await this.operLogService.get(operId));
  }

  @Delete('/:operIds')
  @RequirePermission('monitor:operlog:remove')
  @Log('操作日志', BusinessType.DELETE)
  async remove(@Param('operIds') operIds: string) {
    await this.operLogService.remove(parseIds(operIds));
    return ok(null);
  }
}
