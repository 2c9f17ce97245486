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
import { MonitorUserOperation } from '../../../shared/monitor/monitor.decorators';
import { CurrentUser, LoginUser, RequirePermission } from '../../auth/login-user';
import { BusinessType, Log } from '../../monitor/operlog/log.decorator';
import { ResetPwdDto, UserDto, UserQueryDto, UserStatusDto } from './dto';
import { UserService } from './user.service';

/**
 * 用户管理接口集合，路径前缀 /system/user。
 */
@Controller('/system/user')
export class SystemUserController {
  constructor(private readonly userService: UserService) {}

  @Get('/list')
  @RequirePermission('system:user:list')
  @MonitorUserOperation('system_user_list')
  async list(@Query() query: UserQueryDto) {
    return ok(await this.userService.page(query));
  }

  @Get('/:userId')
  @RequirePermission('system:user:query')
  async detail(@Param('userId', ParseIntPipe) userId: number) {
    return ok(await this.userService.detail(userId));
  }

  @Post()
  @RequirePermission('system:user:add')
  @Log('用户管理', BusinessType.INSERT)
  async add(@Body() dto: UserDto, @CurrentUser() user: LoginUser) {
    const userId = await this.userService.add(dto, user);
    return ok({ userId }, '新增成功');
  }

  @Put()
  @RequirePermission('system:user:edit')
  @Log('用户管理', BusinessType.UPDATE)
  async edit(@Body() dto: UserDto, @CurrentUser() user: LoginUser) {
    await this.userService.edit(dto, user);
    return ok(null, '修改成功');
  }

  @Put('/resetPwd')
  @RequirePermission('system:user:resetPwd')
  @Log('用户管理', BusinessType.UPDATE)
  async resetPwd(@Body() dto: ResetPwdDto, @CurrentUser() user: LoginUser) {
    await this.userService.resetPassword(dto.userId, dto.password, user);
    return ok(null, '重置成功');
  }

  @Put('/changeStatus')
  @RequirePermission('system:user:edit')
  @Log('用户管理', BusinessType.UPDATE)
  async changeStatus(@Body() dto: UserStatusDto, @CurrentUser() user: LoginUser) {
    await this.userService.changeStatus(dto.userId, dto.status, user);
    return ok(null, '修改成功');
  }

  @Delete('/:userIds')
  @RequirePermission('system:user:remove')
  @Log('用户管理', BusinessType.DELETE)
  async remove(@Param('userIds') userIds: string, @CurrentUser() user: LoginUser) {
    await this.userService.remove(parseIds(userIds), user);
    return ok(null, '删除成功');
  }
}
