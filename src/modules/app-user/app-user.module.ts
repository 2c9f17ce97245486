import { Module } from '@nestjs/common';
import { AppAdminController } from './app-admin.controller';
import { AppAuthController } from './app-auth.controller';
import { AppAuthService } from './app-auth.service';
import { AppLoginLogDao, PgAppLoginLogDao } from './app-login-log.dao';
import { AppLoginLogService } from './app-login-log.service';
import { AppUserController } from './app-user.controller';
import { AppUserDao, PgAppUserDao } from './app-user.dao';
import { AppUserService } from './app-user.service';

/**
 * App 用户：后台管理、App 端认证与本人资料。
 */
@Module({
  controllers: [AppAdminController, AppAuthController, AppUserController],
  providers: [
    { provide: AppUserDao, useClass: PgAppUserDao },
    { provide: AppLoginLogDao, useClass: PgAppLoginLogDao },
    AppUserService,
    AppLoginLogService,
    AppAuthService,
  ],
})
export class AppUserModule {}
