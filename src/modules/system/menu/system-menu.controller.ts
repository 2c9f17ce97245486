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
import { CurrentUser, LoginUser, RequirePermission } from '../../auth/login-user';
import { BusinessType, Log } from '../../monitor/operlog/log.decorator';
import { MenuDto, MenuQueryDto } from './dto';
import { MenuService } from './menu.service';

/**
 * 菜单管理接口集合，路径前缀 /system/menu。
 */
@Controller('/system/menu')
export class SystemMenuController {
  constructor(private readonly menuService: MenuService) {}

  @Get('/list')
  @RequirePermission('system:menu:list')
  async list(@Query() query: MenuQueryDto, @CurrentUser() user: LoginUser) {
    return ok(await this.menuService.list(user, query));
  }

  @Get('/treeselect')
  async treeselect(@CurrentUser() user: LoginUser) {
    return ok(await this.menuService.treeselect(user));
  }

  @Get('/roleMenuTreeselect/:roleId')
  async roleMenuTreeselect(
    @Param('roleId', ParseIntPipe) roleId: number,
    @CurrentUser() user: LoginUser,
  ) {
    return ok(await this.menuService.roleMenuTreeselect(user, roleId));
  }

  @Get('/:menuId')
  @RequirePermission('system:menu:query')
  async get(@Param('menuId', ParseIntPipe) menuId: number) {
    return ok(await this.menuService.get(menuId));
  }

  @Post()
  @RequirePermission('system:menu:add')
  @Log('菜单管理', BusinessType.INSERT)
  async add(@Body() dto: MenuDto, @CurrentUser() user: LoginUser) {
    const menuId = await this.menuService.add(dto, user);
    return ok({ menuId }, '新增成功');
  }

  @Put()
  @RequirePermission('system:menu:edit')
  @Log('菜单管理', BusinessType.UPDATE)
  async edit(@Body() dto: MenuDto, @CurrentUser() user: LoginUser) {
    await this.menuService.edit(dto, user);
    return ok(null, '修改成功');
  }

  @Delete('/:menuId')
  @RequirePermission('system:menu:remove')
  @Log('菜单管理', BusinessType.DELETE)
  async remove(@Param('menuId', ParseIntPipe) menuId: number) {
    await this.menuService.remove(menuId);
    return ok(null, '删除成功');
  }
}
