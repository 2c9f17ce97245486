import { Module } from '@nestjs/common';
import { PgSysMenuDao, SysMenuDao } from './menu/menu.dao';
import { MenuService } from './menu/menu.service';
import { SystemMenuController } from './menu/system-menu.controller';
import { PgSysRoleDao, SysRoleDao } from './role/role.dao';
import { RoleService } from './role/role.service';
import { SystemRoleController } from './role/system-role.controller';
import { SystemUserController } from './user/system-user.controller';
import { PgSysUserDao, SysUserDao } from './user/user.dao';
import { UserService } from './user/user.service';

/**
 * 系统管理模块，聚合 /system/user、/system/role、/system/menu 接口。
 */
@Module({
  controllers: [SystemUserController, SystemRoleController, SystemMenuController],
  providers: [
    { provide: SysUserDao, useClass: PgSysUserDao },
    { provide: SysRoleDao, useClass: PgSysRoleDao },
    { provide: SysMenuDao, useClass: PgSysMenuDao },
    UserService,
    RoleService,
    MenuService,
  ],
  exports: [UserService, RoleService, MenuService],
})
export class SystemModule {}
