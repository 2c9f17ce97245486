import * as bcrypt from 'bcryptjs';
import { LoginLog, LoginLogDao, LoginLogQuery, NewLoginLog } from '../../shared/login-log/login-log.dao';
import { PageParams } from '../../shared/page/page';
import { SysConfigDao, SysConfigRow } from '../../shared/sys-config/sys-config.dao';
import { AppUserDao } from '../../modules/app-user/app-user.dao';
import {
  AppUser,
  AppUserPatch,
  AppUserProfile,
  AppUserQuery,
  AppUserStats,
  NewAppUser,
  PROFILE_FIELDS,
  UniqueAppUserField,
} from '../../modules/app-user/app-user.entity';
import { NewOperLog, OperLogDao, OperLogQuery, SysOperLog } from '../../modules/monitor/operlog/operlog.dao';
import { SysMenuDao } from '../../modules/system/menu/menu.dao';
import { MenuFields, MenuQuery, SysMenu } from '../../modules/system/menu/menu.entity';
import { SysRoleDao } from '../../modules/system/role/role.dao';
import { NewSysRole, RoleQuery, SysRole, SysRolePatch, UniqueRoleField } from '../../modules/system/role/role.entity';
import { SysUserDao } from '../../modules/system/user/user.dao';
import { NewSysUser, SysUser, SysUserPatch, UniqueUserField, UserQuery } from '../../modules/system/user/user.entity';

/** 测试用密码哈希，cost 取最小值以加快用例。 */
export function hashPassword(raw: string): string {
  return bcrypt.hashSync(raw, 4);
}

function slice<T>(rows: T[], page: PageParams): { rows: T[]; total: number } {
  return { rows: rows.slice(page.offset, page.offset + page.pageSize), total: rows.length };
}

function includes(value: string, keyword?: string): boolean {
  return !keyword || value.toLowerCase().includes(keyword.toLowerCase());
}

export class MemorySysConfigDao extends SysConfigDao {
  constructor(readonly values: Record<string, string> = {}) {
    super();
  }

  async listAll(): Promise<SysConfigRow[]> {
    return Object.entries(this.values).map(([config_key, config_value]) => ({ config_key, config_value }));
  }

  async findValue(key: string): Promise<string | null> {
    return this.values[key] ?? null;
  }
}

export function sysUser(fields: Partial<SysUser> & Pick<SysUser, 'userId' | 'userName'>): SysUser {
  return {
    deptId: null,
    nickName: fields.userName,
    email: '',
    phonenumber: '',
    sex: '0',
    avatar: '',
    password: '',
    status: '0',
    delFlag: '0',
    loginIp: '',
    loginDate: null,
    createBy: 'admin',
    createTime: new Date(2024, 0, 1, 8, 0, 0),
    updateBy: '',
    updateTime: null,
    remark: '',
    ...fields,
  };
}

export class MemorySysUserDao extends SysUserDao {
  readonly users: SysUser[] = [];
  /** user_id -> role_id[] */
  readonly userRoles = new Map<number, number[]>();
  private nextId = 100;

  async page(query: UserQuery, page: PageParams): Promise<{ rows: SysUser[]; total: number }> {
    const rows = this.alive().filter(
      (u) =>
        includes(u.userName, query.userName) &&
        includes(u.phonenumber, query.phonenumber) &&
        (!query.status || u.status === query.status),
    );
    return slice(rows, page);
  }

  async findById(userId: number): Promise<SysUser | null> {
    return this.alive().find((u) => u.userId === userId) ?? null;
  }

  async findByUserName(userName: string): Promise<SysUser | null> {
    return this.alive().find((u) => u.userName === userName) ?? null;
  }

  async existsBy(field: UniqueUserField, value: string, excludeId?: number): Promise<boolean> {
    return this.alive().some((u) => {
      const current = field === 'user_name' ? u.userName : field === 'email' ? u.email : u.phonenumber;
      return current === value && u.userId !== excludeId;
    });
  }

  async insert(user: NewSysUser, roleIds: number[]): Promise<number> {
    const userId = this.nextId++;
    this.users.push(sysUser({ ...user, deptId: user.deptId ?? null, userId, createTime: new Date() }));
    this.userRoles.set(userId, [...roleIds]);
    return userId;
  }

  async update(userId: number, patch: SysUserPatch, roleIds?: number[]): Promise<void> {
    const user = await this.findById(userId);
    if (!user) return;
    for (const [k, v] of Object.entries(patch)) {
      if (v !== undefined) Object.assign(user, { [k]: v });
    }
    if (roleIds) this.userRoles.set(userId, [...roleIds]);
  }

  async softDelete(userIds: number[], updateBy: string): Promise<number> {
    let n = 0;
    for (const user of this.alive()) {
      if (userIds.includes(user.userId)) {
        user.delFlag = '2';
        user.updateBy = updateBy;
        n++;
      }
    }
    return n;
  }

  async updatePassword(userId: number, password: string, updateBy: string): Promise<void> {
    await this.update(userId, { updateBy });
    const user = await this.findById(userId);
    if (user) user.password = password;
  }

  async updateStatus(userId: number, status: string, updateBy: string): Promise<void> {
    await this.update(userId, { status, updateBy });
  }

  async updateLoginInfo(userId: number, ip: string, loginDate: Date): Promise<void> {
    const user = await this.findById(userId);
    if (user) {
      user.loginIp = ip;
      user.loginDate = loginDate;
    }
  }

  async roleIdsOf(userId: number): Promise<number[]> {
    return this.userRoles.get(userId) ?? [];
  }

  private alive(): SysUser[] {
    return this.users.filter((u) => u.delFlag === '0');
  }
}

export function sysRole(fields: Partial<SysRole> & Pick<SysRole, 'roleId' | 'roleName' | 'roleKey'>): SysRole {
  return {
    roleSort: fields.roleId,
    status: '0',
    delFlag: '0',
    createBy: 'admin',
    createTime: null,
    updateBy: '',
    updateTime: null,
    remark: '',
    ...fields,
  };
}

export class MemorySysRoleDao extends SysRoleDao {
  readonly roles: SysRole[] = [];
  /** role_id -> menu_id[] */
  readonly roleMenus = new Map<number, number[]>();
  private nextId = 100;

  constructor(private readonly userDao: MemorySysUserDao) {
    super();
  }

  async page(query: RoleQuery, page: PageParams): Promise<{ rows: SysRole[]; total: number }> {
    const rows = this.alive().filter(
      (r) =>
        includes(r.roleName, query.roleName) &&
        includes(r.roleKey, query.roleKey) &&
        (!query.status || r.status === query.status),
    );
    return slice(rows, page);
  }

  async listAll(): Promise<SysRole[]> {
    return this.alive();
  }

  async findById(roleId: number): Promise<SysRole | null> {
    return this.alive().find((r) => r.roleId === roleId) ?? null;
  }

  async listByUserId(userId: number): Promise<SysRole[]> {
    const ids = this.userDao.userRoles.get(userId) ?? [];
    return this.alive().filter((r) => ids.includes(r.roleId));
  }

  async existsBy(field: UniqueRoleField, value: string, excludeId?: number): Promise<boolean> {
    return this.alive().some(
      (r) => (field === 'role_name' ? r.roleName : r.roleKey) === value && r.roleId !== excludeId,
    );
  }

  async insert(role: NewSysRole, menuIds: number[]): Promise<number> {
    const roleId = this.nextId++;
    this.roles.push(sysRole({ ...role, roleId }));
    this.roleMenus.set(roleId, [...menuIds]);
    return roleId;
  }

  async update(roleId: number, patch: SysRolePatch, menuIds?: number[]): Promise<void> {
    const role = await this.findById(roleId);
    if (!role) return;
    for (const [k, v] of Object.entries(patch)) {
      if (v !== undefined) Object.assign(role, { [k]: v });
    }
    if (menuIds) this.roleMenus.set(roleId, [...menuIds]);
  }

  async softDelete(roleIds: number[], updateBy: string): Promise<number> {
    let n = 0;
    for (const role of this.alive()) {
      if (roleIds.includes(role.roleId)) {
        role.delFlag = '2';
        role.updateBy = updateBy;
        n++;
      }
    }
    return n;
  }

  async countUsers(roleId: number): Promise<number> {
    return [...this.userDao.userRoles.values()].filter((ids) => ids.includes(roleId)).length;
  }

  async menuIdsOf(roleId: number): Promise<number[]> {
    return this.roleMenus.get(roleId) ?? [];
  }

  private alive(): SysRole[] {
    return this.roles.filter((r) => r.delFlag === '0');
  }
}

export function sysMenu(
  fields: Partial<SysMenu> & Pick<SysMenu, 'menuId' | 'menuName' | 'parentId' | 'menuType'>,
): SysMenu {
  return {
    orderNum: 0,
    path: '',
    component: '',
    query: '',
    isFrame: '1',
    isCache: '0',
    visible: '0',
    status: '0',
    perms: '',
    icon: '#',
    createBy: 'admin',
    createTime: null,
    updateBy: '',
    updateTime: null,
    remark: '',
    ...fields,
  };
}

export class MemorySysMenuDao extends SysMenuDao {
  readonly menus: SysMenu[] = [];
  private nextId = 2000;

  constructor(
    private readonly roleDao: MemorySysRoleDao,
    private readonly userDao: MemorySysUserDao,
  ) {
    super();
  }

  async list(query: MenuQuery): Promise<SysMenu[]> {
    return this.menus.filter(
      (m) => includes(m.menuName, query.menuName) && (!query.status || m.status === query.status),
    );
  }

  async listByUserId(userId: number, query: MenuQuery): Promise<SysMenu[]> {
    const ids = this.grantedMenuIds(userId);
    return (await this.list(query)).filter((m) => ids.has(m.menuId));
  }

  async findById(menuId: number): Promise<SysMenu | null> {
    return this.menus.find((m) => m.menuId === menuId) ?? null;
  }

  async existsName(menuName: string, parentId: number, excludeId?: number): Promise<boolean> {
    return this.menus.some(
      (m) => m.menuName === menuName && m.parentId === parentId && m.menuId !== excludeId,
    );
  }

  async hasChildren(menuId: number): Promise<boolean> {
    return this.menus.some((m) => m.parentId === menuId);
  }

  async isAssigned(menuId: number): Promise<boolean> {
    return [...this.roleDao.roleMenus.values()].some((ids) => ids.includes(menuId));
  }

  async insert(menu: MenuFields, createBy: string): Promise<number> {
    const menuId = this.nextId++;
    this.menus.push({ ...menu, menuId, createBy, createTime: null, updateBy: '', updateTime: null });
    return menuId;
  }

  async update(menuId: number, menu: MenuFields, updateBy: string): Promise<void> {
    const existing = await this.findById(menuId);
    if (existing) Object.assign(existing, menu, { updateBy });
  }

  async delete(menuId: number): Promise<void> {
    const index = this.menus.findIndex((m) => m.menuId === menuId);
    if (index >= 0) this.menus.splice(index, 1);
  }

  async permsByUserId(userId: number): Promise<string[]> {
    const ids = this.grantedMenuIds(userId);
    return this.menus.filter((m) => ids.has(m.menuId) && m.perms).map((m) => m.perms);
  }

  private grantedMenuIds(userId: number): Set<number> {
    const roleIds = this.userDao.userRoles.get(userId) ?? [];
    const ids = new Set<number>();
    for (const role of this.roleDao.roles) {
      if (role.delFlag !== '0' || role.status !== '0' || !roleIds.includes(role.roleId)) continue;
      (this.roleDao.roleMenus.get(role.roleId) ?? []).forEach((id) => ids.add(id));
    }
    return ids;
  }
}

/** 管理端与 App 端登录日志共用的内存实现。 */
export class MemoryLoginLogDao extends LoginLogDao {
  readonly logs: LoginLog[] = [];
  private nextId = 1;

  async insert(log: NewLoginLog): Promise<void> {
    this.logs.push({ ...log, id: this.nextId++, loginTime: new Date() });
  }

  async page(query: LoginLogQuery, page: PageParams): Promise<{ rows: LoginLog[]; total: number }> {
    const rows = this.logs
      .filter(
        (l) =>
          includes(l.userName, query.userName) &&
          includes(l.ipaddr, query.ipaddr) &&
          (!query.status || l.status === query.status),
      )
      .reverse();
    return slice(rows, page);
  }

  async deleteByIds(ids: number[]): Promise<number> {
    return this.removeWhere((l) => ids.includes(l.id));
  }

  async deleteBefore(time: Date | null): Promise<number> {
    return this.removeWhere((l) => time === null || (l.loginTime !== null && l.loginTime < time));
  }

  async count(): Promise<number> {
    return this.logs.length;
  }

  private removeWhere(pred: (log: LoginLog) => boolean): number {
    const before = this.logs.length;
    const kept = this.logs.filter((l) => !pred(l));
    this.logs.splice(0, this.logs.length, ...kept);
    return before - kept.length;
  }
}

export class MemoryOperLogDao extends OperLogDao {
  readonly logs: SysOperLog[] = [];
  private nextId = 1;

  async insert(log: NewOperLog): Promise<void> {
    this.logs.push({ ...log, operId: this.nextId++, operTime: new Date() });
  }

  async page(query: OperLogQuery, page: PageParams): Promise<{ rows: SysOperLog[]; total: number }> {
    const rows = this.logs.filter(
      (l) =>
        includes(l.title, query.title) &&
        includes(l.operName, query.operName) &&
        (query.businessType === undefined || l.businessType === query.businessType) &&
        (query.status === undefined || l.status === query.status),
    );
    return slice([...rows].reverse(), page);
  }

  async findById(operId: number): Promise<SysOperLog | null> {
    return this.logs.find((l) => l.operId === operId) ?? null;
  }

  async deleteByIds(ids: number[]): Promise<number> {
    const before = this.logs.length;
    const kept = this.logs.filter((l) => !ids.includes(l.operId));
    this.logs.splice(0, this.logs.length, ...kept);
    return before - kept.length;
  }

  async clean(): Promise<number> {
    return this.logs.splice(0, this.logs.length).length;
  }
}

export function appUser(fields: Partial<AppUser> & Pick<AppUser, 'userId' | 'userName'>): AppUser {
  return {
    nickName: fields.userName,
    email: '',
    phone: '',
    sex: '0',
    avatar: '',
    password: '',
    status: '0',
    loginIp: '',
    loginDate: null,
    createBy: '',
    createTime: new Date(2024, 0, 1, 8, 0, 0),
    updateBy: '',
    updateTime: null,
    remark: '',
    ...fields,
  };
}

function emptyProfile(): AppUserProfile {
  return {
    realName: null,
    idCard: null,
    birthday: null,
    address: null,
    education: null,
    occupation: null,
    incomeLevel: null,
    maritalStatus: null,
    emergencyContact: null,
    emergencyPhone: null,
  };
}

export class MemoryAppUserDao extends AppUserDao {
  readonly users: AppUser[] = [];
  readonly profiles = new Map<number, AppUserProfile>();
  private nextId = 1;

  async page(query: AppUserQuery, page: PageParams): Promise<{ rows: AppUser[]; total: number }> {
    const rows = this.users.filter(
      (u) =>
        includes(u.userName, query.userName) &&
        includes(u.nickName, query.nickName) &&
        includes(u.email, query.email) &&
        includes(u.phone, query.phone) &&
        (!query.sex || u.sex === query.sex) &&
        (!query.status || u.status === query.status),
    );
    return slice(rows, page);
  }

  async findById(userId: number): Promise<AppUser | null> {
    return this.users.find((u) => u.userId === userId) ?? null;
  }

  async findByUserName(userName: string): Promise<AppUser | null> {
    return this.users.find((u) => u.userName === userName) ?? null;
  }

  async findByAccount(account: string): Promise<AppUser | null> {
    return this.users.find((u) => u.userName === account || (u.email !== '' && u.email === account)) ?? null;
  }

  async existsBy(field: UniqueAppUserField, value: string, excludeUserId?: number): Promise<boolean> {
    return this.users.some((u) => {
      const current = field === 'user_name' ? u.userName : field === 'phone' ? u.phone : u.email;
      return current === value && u.userId !== excludeUserId;
    });
  }

  async insert(user: NewAppUser, profile: Partial<AppUserProfile> | null): Promise<number> {
    const userId = this.nextId++;
    this.users.push(
      appUser({ ...user, avatar: user.avatar ?? '', remark: user.remark ?? '', userId, createTime: new Date() }),
    );
    if (profile) this.profiles.set(userId, { ...emptyProfile(), ...profile });
    return userId;
  }

  async update(userId: number, patch: AppUserPatch): Promise<void> {
    const user = await this.findById(userId);
    if (!user) return;
    for (const [k, v] of Object.entries(patch)) {
      if (v !== undefined) Object.assign(user, { [k]: v });
    }
  }

  async findProfile(userId: number): Promise<AppUserProfile | null> {
    return this.profiles.get(userId) ?? null;
  }

  async upsertProfile(userId: number, profile: Partial<AppUserProfile>): Promise<void> {
    if (!PROFILE_FIELDS.some((f) => profile[f] !== undefined)) return;
    this.profiles.set(userId, { ...(this.profiles.get(userId) ?? emptyProfile()), ...profile });
  }

  async deleteByIds(userIds: number[]): Promise<number> {
    const before = this.users.length;
    const kept = this.users.filter((u) => !userIds.includes(u.userId));
    this.users.splice(0, this.users.length, ...kept);
    userIds.forEach((id) => this.profiles.delete(id));
    return before - kept.length;
  }

  async updatePassword(userId: number, password: string, updateBy: string): Promise<void> {
    const user = await this.findById(userId);
    if (user) Object.assign(user, { password, updateBy });
  }

  async updateLoginInfo(userId: number, ip: string, loginDate: Date): Promise<void> {
    const user = await this.findById(userId);
    if (user) Object.assign(user, { loginIp: ip, loginDate });
  }

  async search(keyword: string, page: PageParams): Promise<{ rows: AppUser[]; total: number }> {
    const rows = this.users.filter(
      (u) => u.status === '0' && (includes(u.userName, keyword) || includes(u.nickName, keyword)),
    );
    return slice(rows, page);
  }

  async stats(todayStart: Date): Promise<AppUserStats> {
    return {
      totalUsers: this.users.length,
      activeUsers: this.users.filter((u) => u.status === '0').length,
      todayNewUsers: this.users.filter((u) => u.createTime !== null && u.createTime >= todayStart).length,
    };
  }
}

export const ADMIN_PASSWORD = 'admin123';
export const OPERATOR_PASSWORD = 'operator123';

export interface SystemDaos {
  users: MemorySysUserDao;
  roles: MemorySysRoleDao;
  menus: MemorySysMenuDao;
}

/**
 * 种子数据：admin（超级管理员）与 operator（普通角色，只有用户管理菜单）。
 */
export function createSystemDaos(): SystemDaos {
  const users = new MemorySysUserDao();
  const roles = new MemorySysRoleDao(users);
  const menus = new MemorySysMenuDao(roles, users);
  users.users.push(
    sysUser({ userId: 1, userName: 'admin', nickName: '管理员', password: hashPassword(ADMIN_PASSWORD) }),
    sysUser({ userId: 2, userName: 'operator', nickName: '操作员', password: hashPassword(OPERATOR_PASSWORD) }),
  );
  users.userRoles.set(1, [1]);
  users.userRoles.set(2, [2]);
  roles.roles.push(
    sysRole({ roleId: 1, roleName: '超级管理员', roleKey: 'admin' }),
    sysRole({ roleId: 2, roleName: '普通角色', roleKey: 'common' }),
  );
  roles.roleMenus.set(2, [1, 100, 1000]);
  menus.menus.push(
    sysMenu({ menuId: 1, menuName: '系统管理', parentId: 0, menuType: 'M', orderNum: 1, path: 'system', icon: 'system' }),
    sysMenu({
      menuId: 100,
      menuName: '用户管理',
      parentId: 1,
      menuType: 'C',
      orderNum: 1,
      path: 'user',
      component: 'system/user/index',
      perms: 'system:user:list',
      icon: 'user',
    }),
    sysMenu({ menuId: 1000, menuName: '用户查询', parentId: 100, menuType: 'F', orderNum: 1, perms: 'system:user:query' }),
    sysMenu({
      menuId: 101,
      menuName: '角色管理',
      parentId: 1,
      menuType: 'C',
      orderNum: 2,
      path: 'role',
      component: 'system/role/index',
      perms: 'system:role:list',
      icon: 'peoples',
    }),
  );
  return { users, roles, menus };
}
