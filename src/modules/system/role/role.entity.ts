export interface SysRole {
  roleId: number;
  roleName: string;
  roleKey: string;
  roleSort: number;
  status: string;
  delFlag: string;
  createBy: string;
  createTime: Date | null;
  updateBy: string;
  updateTime: Date | null;
  remark: string;
}

export type NewSysRole = Pick<SysRole, 'roleName' | 'roleKey' | 'roleSort' | 'status' | 'remark' | 'createBy'>;

export type SysRolePatch = Partial<Pick<SysRole, 'roleName' | 'roleKey' | 'roleSort' | 'status' | 'remark'>> & {
  updateBy: string;
};

export interface RoleQuery {
  roleName?: string;
  roleKey?: string;
  status?: string;
}

export type UniqueRoleField = 'role_name' | 'role_key';

/** 超级管理员角色 ID 与权限字符。 */
export const SUPER_ADMIN_ROLE_ID = 1;
export const SUPER_ADMIN_ROLE_KEY = 'admin';
