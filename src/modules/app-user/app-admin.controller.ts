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
import { ok } from '../../shared/api-response/api-response';
import { CacheEvict, Cacheable } from '../../shared/cache/cache.decorators';
import { LoginLogQueryDto } from '../../shared/login-log/login-log';
import {
  MonitorStatsOperation,
  MonitorUserOperation,
  TrackMetric,
} from '../../shared/monitor/monitor.decorators';
import { CurrentUser, LoginUser, RequirePermission } from '../auth/login-user';
import { BusinessType, Log } from '../monitor/operlog/log.decorator';
import { AppLoginLogService, DEFAULT_CLEAN_DAYS } from './app-login-log.service';
import { LOGIN_LOG_CACHE, STATS_CACHE, USER_CACHE } from './app-user.cache';
import { AppUserService } from './app-user.service';
import {
  AppUserCreateDto,
  AppUserQueryDto,
  AppUserStatusDto,
  AppUserUpdateDto,
  IdsDto,
  LoginLogCleanDto,
  ResetPasswordDto,
} from './dto';

/**
 * 后台管理 App 用户：/app/v1/admin*，使用管理端 token 与菜单权限。
 */
@Controller('/app/v1/admin')
export class AppAdminController {
  constructor(
    private readonly appUserService: AppUserService,
    private readonly loginLogService: AppLoginLogService,
  ) {}

  @Get('/user/list')
  @RequirePermission('app:user:list')
  @Cacheable({ prefix: 'app:user:list', ttl: 300 })
  @MonitorUserOperation('app_admin_user_list')
  async listUsers(@Query() query: AppUserQueryDto) {
    return ok(await this.appUserService.page(query));
  }

  @Get('/user/:userId')
  @RequirePermission('app:user:query')
  @Cacheable({ prefix: 'app:user:detail', ttl: 600 })
  @MonitorUserOperation('app_admin_user_detail')
  async getUser(@Param('userId', ParseIntPipe) userId: number) {
    return ok(await this.appUserService.detail(userId));
  }

  @Post('/user')
  @RequirePermission('app:user:add')
  @CacheEvict(USER_CACHE, STATS_CACHE)
  @MonitorUserOperation('app_admin_user_create')
  @TrackMetric({ name: 'app_user_created', tags: { source: 'admin' } })
  @Log('App用户', BusinessType.INSERT)
  async createUser(@Body() dto: AppUserCreateDto, @CurrentUser() user: LoginUser) {
    const userId = await this.appUserService.create(dto, user.userName);
    return ok({ userId }, '新增成功');
  }

  @Put('/user/:userId')
  @RequirePermission('app:user:edit')
  @CacheEvict(USER_CACHE, STATS_CACHE)
  @MonitorUserOperation('app_admin_user_update')
  @Log('App用户', BusinessType.UPDATE)
  async updateUser(
    @Param('userId', ParseIntPipe) userId: number,
    @Body() dto: AppUserUpdateDto,
    @CurrentUser() user: LoginUser,
  ) {
    await this.appUserService.update(userId, dto, user.userName);
    return ok(null, '修改成功');
  }

  @Delete('/user')
  @RequirePermission('app:user:remove')
  @CacheEvict(USER_CACHE, STATS_CACHE)
  @MonitorUserOperation('app_admin_user_delete')
  @Log('App用户', BusinessType.DELETE)
  async deleteUsers(@Body() dto: IdsDto) {
    const count = await this.appUserService.remove(dto.ids);
    return ok({ count }, '删除成功');
  }

  @Put('/user/:userId/status')
  @RequirePermission('app:user:edit')
  @CacheEvict(USER_CACHE, STATS_CACHE)
  @Log('App用户', BusinessType.UPDATE)
  async changeStatus(
    @Param('userId', ParseIntPipe) userId: number,
    @Body() dto: AppUserStatusDto,
    @CurrentUser() user: LoginUser,
  ) {
    const msg = await this.appUserService.changeStatus(userId, dto.status, user.userName);
    return ok(null, msg);
  }

  @Put('/user/:userId/reset-password')
  @RequirePermission('app:user:edit')
  @Log('App用户', BusinessType.UPDATE, { saveRequest: false })
  async resetPassword(
    @Param('userId', ParseIntPipe) userId: number,
    @Body() dto: ResetPasswordDto,
    @CurrentUser() user: LoginUser,
  ) {
    await this.appUserService.resetPassword(userId, dto.password, user.userName);
    return ok(null, '密码重置成功');
  }

  @Get('/login-log/list')
  @RequirePermission('app:loginlog:list')
  @Cacheable({ prefix: 'app:loginlog:list', ttl: 300 })
  async listLoginLogs(@Query() query: LoginLogQueryDto) {
    return ok(await this.loginLogService.page(query));
  }

  @Delete('/login-log/clean')
  @RequirePermission('app:loginlog:remove')
  @CacheEvict(LOGIN_LOG_CACHE, STATS_CACHE)
  @Log('App登录日志', BusinessType.CLEAN)
  async cleanLoginLogs(@Query() query: LoginLogCleanDto) {
    const count = await this.loginLogService.clean(query.days ?? DEFAULT_CLEAN_DAYS);
    return ok({ count }, '清理成功');
  }

  @Delete('/login-log')
  @RequirePermission('app:loginlog:remove')
  @CacheEvict(LOGIN_LOG_CACHE, STATS_CACHE)
  @Log('App登录日志', BusinessType.DELETE)
  async deleteLoginLogs(@Body() dto: IdsDto) {
    const count = await this.loginLogService.remove(dto.ids);
    return ok({ count }, '删除成功');
  }

  @Get('/stats/overview')
  @RequirePermission('app:stats:query')
  @Cacheable({ prefix: 'app:stats:overview', ttl: 60 })
  @MonitorStatsOperation('app_stats_overview')
  async statsOverview() {
    return ok(await this.appUserService.stats(), '获取APP统计概览成功');
  }
}
