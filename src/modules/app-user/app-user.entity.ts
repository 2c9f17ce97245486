export interface AppUser {
  userId: number;
  userName: string;
  nickName: string;
  email: string;
  phone: string;
  sex: string;
  avatar: string;
  password: string;
  status: string;
  loginIp: string;
  loginDate: Date | null;
  createBy: string;
  createTime: Date | null;
  updateBy: string;
  updateTime: Date | null;
  remark: string;
}

/** 一对一扩展资料，所有字段可空。 */
export interface AppUserProfile {
  realName: string | null;
  idCard: string | null;
  birthday: string | null;
  address: string | null;
  education: string | null;
  occupation: string | null;
  incomeLevel: string | null;
  maritalStatus: string | null;
  emergencyContact: string | null;
  emergencyPhone: string | null;
}

export type ProfileField = keyof AppUserProfile;

export const PROFILE_FIELDS: ProfileField[] = [
  'realName',
  'idCard',
  'birthday',
  'address',
  'education',
  'occupation',
  'incomeLevel',
  'maritalStatus',
  'emergencyContact',
  'emergencyPhone',
];

export type NewAppUser = Pick<
  AppUser,
  'userName' | 'nickName' | 'email' | 'phone' | 'sex' | 'password' | 'status' | 'createBy'
> & { avatar?: string; remark?: string };

/** undefined 表示不修改。 */
export type AppUserPatch = Partial<
  Pick<AppUser, 'nickName' | 'email' | 'phone' | 'sex' | 'avatar' | 'status' | 'remark'>
> & { updateBy: string };

export interface AppUserQuery {
  userName?: string;
  nickName?: string;
  email?: string;
  phone?: string;
  sex?: string;
  status?: string;
  beginTime?: Date | null;
  endTime?: Date | null;
}

export type UniqueAppUserField = 'user_name' | 'phone' | 'email';

export interface AppUserStats {
  totalUsers: number;
  activeUsers: number;
  todayNewUsers: number;
}
