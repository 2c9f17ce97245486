import { Body, Controller, Get, Param, ParseIntPipe, Put, Query } from '@nestjs/common';
import { ok } from '../../shared/api-response/api-response';
import { CacheEvict } from '../../shared/cache/cache.decorators';
import { MonitorUserOperation } from '../../shared/monitor/monitor.decorators';
import { AppAuth, AppLoginUser, CurrentAppUser } from '../auth/login-user';
import { USER_CACHE } from './app-user.cache';
import { AppUserService } from './app-user.service';
import { ChangePasswordDto, ProfileUpdateDto, UserSearchDto } from './dto';

/**
 * App 用户本人资料：/app/v1/user*
 */
@Controller('/app/v1/user')
@AppAuth()
export class AppUserController {
  constructor(private readonly appUserService: AppUserService) {}

  @Get('/profile')
  async profile(@CurrentAppUser() user: AppLoginUser) {
    return ok(await this.appUserService.detail(user.userId));
  }

  @Put('/profile')
  @CacheEvict(USER_CACHE)
  @MonitorUserOperation('app_user_update_profile')
  async updateProfile(@Body() dto: ProfileUpdateDto, @CurrentAppUser() user: AppLoginUser) {
    await this.appUserService.update(user.userId, dto, user.userName);
    return ok(await this.appUserService.detail(user.userId), '修改成功');
  }

  @Put('/password')
  @CacheEvict(USER_CACHE)
  async changePassword(@Body() dto: ChangePasswordDto, @CurrentAppUser() user: AppLoginUser) {
    await this.appUserService.changePassword(user.userId, dto);
    return ok(null, '密码修改成功');
  }

  @Get('/search')
  async search(@Query() query: UserSearchDto) {
    return ok(await this.appUserService.search(query.keyword, query.pageNum, query.pageSize));
  }

  @Get('/:userId')
  async getUser(@Param('userId', ParseIntPipe) userId: number) {
    return ok(await this.appUserService.publicProfile(userId));
  }
}
