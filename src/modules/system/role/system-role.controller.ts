import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ok } from '../../../shared/api-response/api-response';
import { parseIds } from '../../../shared/page/page';
import { CurrentUser, LoginUser, RequirePermission } from '../../auth/login-user';
import { BusinessType, Log } from '../../monitor/operlog/log.decorator';
import { RoleDto, RoleQueryDto, RoleStatusDto } from './dto';
import { RoleService } from './role.service';

/**
 * 角色管理接口集合，路径前缀 /system/role。
 */
@Controller('/system/role')
export class SystemRoleController {
  constructor(private readonly roleService: RoleService) {}

  @Get('/list')
  @RequirePermission('system:role:list')
  async list(@Query() query: RoleQueryDto) {
    return ok(await this.roleService.page(query));
  }

  /** 下拉选项：全部未删除角色。 */
  @Get('/optionselect')
  @RequirePermission('system:role:query')
  async optionselect() {
    return ok(await this.roleService.listAll());
  }

  @Get('/:roleId')
  @RequirePermission('system:role:query')
  async get(@Param('roleId', ParseIntPipe) roleId: number) {
    return ok(await this.roleService.get(roleId));
  }

  @Post()
  @RequirePermission('system:role:add')
  @Log('角色管理', BusinessType.INSERT)
  async add(@Body() dto: RoleDto, @CurrentUser() user: LoginUser) {
    const roleId = await this.roleService.add(dto, user);
    return ok({ roleId }, '新增成功');
  }

  @Put()
  @RequirePermission('system:role:edit')
  @Log('角色管理', BusinessType.UPDATE)
  async edit(@Body() dto: RoleDto, @CurrentUser() user: LoginUser) {
    await this.roleService.edit(dto, user);
    return ok(null, '修改成功');
  }

  @Put('/changeStatus')
  @RequirePermission('system:role:edit')
  @Log('角色管理', BusinessType.UPDATE)
  async changeStatus(@Body() dto: RoleStatusDto, @CurrentUser() user: LoginUser) {
    await this.roleService.changeStatus(dto.roleId, dto.status, user);
    return ok(null, '修改成功');
  }

  @Delete('/:roleIds')
  @RequirePermission('system:role:remove')
  @Log('角色管理', BusinessType.DELETE)
  async remove(@Param('roleIds') roleIds: string, @CurrentUser() user: LoginUser) {
    await this.roleService.remove(parseIds(roleIds), user);
    return ok(null, '删除成功');
  }
}
