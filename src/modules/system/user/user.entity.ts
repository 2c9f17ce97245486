export interface SysUser {
  userId: number;
  deptId: number | null;
  userName: string;
  nickName: string;
  email: string;
  phonenumber: string;
  sex: string;
  avatar: string;
  password: string;
  status: string;
  delFlag: string;
  loginIp: string;
  loginDate: Date | null;
  createBy: string;
  createTime: Date | null;
  updateBy: string;
  updateTime: Date | null;
  remark: string;
}

export type NewSysUser = Pick<
  SysUser,
  'userName' | 'nickName' | 'email' | 'phonenumber' | 'sex' | 'password' | 'status' | 'remark' | 'createBy'
> & { deptId?: number | null };

export type SysUserPatch = Partial<
  Pick<SysUser, 'nickName' | 'email' | 'phonenumber' | 'sex' | 'status' | 'remark' | 'deptId' | 'avatar'>
> & { updateBy: string };

export interface UserQuery {
  userName?: string;
  phonenumber?: string;
  status?: string;
  beginTime?: Date | null;
  endTime?: Date | null;
}

export type UniqueUserField = 'user_name' | 'phonenumber' | 'email';

/** 超级管理员用户 ID。 */
export const SUPER_ADMIN_ID = 1;
