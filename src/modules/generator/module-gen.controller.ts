import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { ok } from '../../shared/api-response/api-response';
import { RequirePermission } from '../auth/login-user';
import { BusinessType, Log } from '../monitor/operlog/log.decorator';
import { ModuleGenDto } from './dto';
import { ModuleGenService } from './module-gen.service';

/**
 * 模块化代码生成：/tool/gen*
 */
@Controller('/tool/gen')
export class ModuleGenController {
  constructor(private readonly moduleGenService: ModuleGenService) {}

  @Post('/module')
  @RequirePermission('tool:gen:code')
  @Log('代码生成', BusinessType.OTHER)
  generate(@Body() dto: ModuleGenDto) {
    return ok(this.moduleGenService.generate(dto), '模块化代码生成成功');
  }

  @Get('/modules')
  @RequirePermission('tool:gen:list')
  modules() {
    return ok(this.moduleGenService.supportedModules());
  }

  @Get('/template/:moduleType')
  @RequirePermission('tool:gen:list')
  template(@Param('moduleType') moduleType: string) {
    return ok(this.moduleGenService.template(moduleType));
  }
}
