import { Injectable } from '@nestjs/common';
import { ServiceWarning } from '../../../shared/exception/exceptions';
import { buildPage, normalizePage, PageResult } from '../../../shared/page/page';
import { formatDateTime } from '../../../shared/time/time';
import { LoginUser } from '../../auth/login-user';
import { RoleDetailResp, RoleDto, RoleQueryDto, RoleResp } from './dto';
import { SysRoleDao } from './role.dao';
import { SUPER_ADMIN_ROLE_ID, SysRole } from './role.entity';

export function toRoleResp(r: SysRole): RoleResp {
  return {
    roleId: r.roleId,
    roleName: r.roleName,
    roleKey: r.roleKey,
    roleSort: r.roleSort,
    status: r.status,
    createTime: formatDateTime(r.createTime),
    remark: r.remark,
    admin: r.roleId === SUPER_ADMIN_ROLE_ID,
  };
}

@Injectable()
export class RoleService {
  constructor(private readonly roleDao: SysRoleDao) {}

  async page(query: RoleQueryDto): Promise<PageResult<RoleResp>> {
    const page = normalizePage(query.pageNum, query.pageSize);
    const { rows, total } = await this.roleDao.page(
      { roleName: query.roleName, roleKey: query.roleKey, status: query.status },
      page,
    );
    return buildPage(rows.map(toRoleResp), total, page);
  }

  async listAll(): Promise<RoleResp[]> {
    return (await this.roleDao.listAll()).map(toRoleResp);
  }

  async get(roleId: number): Promise<RoleDetailResp> {
    const role = await this.roleDao.findById(roleId);
    if (!role) throw new ServiceWarning('角色不存在');
    return { ...toRoleResp(role), menuIds: await this.roleDao.menuIdsOf(roleId) };
  }

  /** 角色 key 列表，超级管理员固定为 admin。 */
  async roleKeysOf(userId: number): Promise<string[]> {
    const roles = await this.roleDao.listByUserId(userId);
    return roles.filter((r) => r.status === '0').map((r) => r.roleKey);
  }

  async add(dto: RoleDto, user: LoginUser): Promise<number> {
    const roleName = dto.roleName.trim();
    const roleKey = dto.roleKey.trim();
    if (await this.roleDao.existsBy('role_name', roleName)) {
      throw new ServiceWarning(`新增角色'${roleName}'失败，角色名称已存在`);
    }
    if (await this.roleDao.existsBy('role_key', roleKey)) {
      throw new ServiceWarning(`新增角色'${roleName}'失败，权限字符已存在`);
    }
    return this.roleDao.insert(
      {
        roleName,
        roleKey,
        roleSort: dto.roleSort,
        status: dto.status ?? '0',
        remark: dto.remark ?? '',
        createBy: user.userName,
      },
      dto.menuIds ?? [],
    );
  }

  async edit(dto: RoleDto, user: LoginUser): Promise<void> {
    const roleId = dto.roleId ?? 0;
    this.assertNotSuperAdmin(roleId);
    if (!(await this.roleDao.findById(roleId))) {
      throw new ServiceWarning('角色不存在');
    }
    const roleName = dto.roleName.trim();
    const roleKey = dto.roleKey.trim();
    if (await this.roleDao.existsBy('role_name', roleName, roleId)) {
      throw new ServiceWarning(`修改角色'${roleName}'失败，角色名称已存在`);
    }
    if (await this.roleDao.existsBy('role_key', roleKey, roleId)) {
      throw new ServiceWarning(`修改角色'${roleName}'失败，权限字符已存在`);
    }
    await this.roleDao.update(
      roleId,
      {
        roleName,
        roleKey,
        roleSort: dto.roleSort,
        status: dto.status,
        remark: dto.remark,
        updateBy: user.userName,
      },
      dto.menuIds,
    );
  }

  async changeStatus(roleId: number, status: string, user: LoginUser): Promise<void> {
    this.assertNotSuperAdmin(roleId);
    await this.roleDao.update(roleId, { status, updateBy: user.userName });
  }

  async remove(roleIds: number[], user: LoginUser): Promise<number> {
    if (!roleIds.length) throw new ServiceWarning('请选择要删除的角色');
    for (const roleId of roleIds) {
      this.assertNotSuperAdmin(roleId);
      const role = await this.roleDao.findById(roleId);
      if (!role) continue;
      if ((await this.roleDao.countUsers(roleId)) > 0) {
        throw new ServiceWarning(`${role.roleName}已分配,不能删除`);
      }
    }
    return this.roleDao.softDelete(roleIds, user.userName);
  }

  private assertNotSuperAdmin(roleId: number): void {
    if (roleId === SUPER_ADMIN_ROLE_ID) {
      throw new ServiceWarning('不允许操作超级管理员角色');
    }
  }
}
