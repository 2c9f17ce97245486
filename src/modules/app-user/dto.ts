import { Type } from 'class-transformer';
import {
  IsArray,
  IsEmail,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Length,
  Matches,
  Max,
  MaxLength,
  Min,
  ValidateIf,
} from 'class-validator';
import { AppUserProfile } from './app-user.entity';

const PHONE_RULE = /^1[3-9]\d{9}$/;

/** 扩展资料字段，新增、修改与个人资料共用。 */
export class ProfileFieldsDto {
  @IsOptional()
  @IsString()
  @MaxLength(50)
  realName?: string;

  @IsOptional()
  @IsString()
  @MaxLength(18)
  idCard?: string;

  @IsOptional()
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: '生日格式应为 YYYY-MM-DD' })
  birthday?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  address?: string;

  @IsOptional()
  @IsString()
  @MaxLength(20)
  education?: string;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  occupation?: string;

  @IsOptional()
  @IsString()
  @MaxLength(20)
  incomeLevel?: string;

  @IsOptional()
  @IsIn(['0', '1', '2'])
  maritalStatus?: string;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  emergencyContact?: string;

  @IsOptional()
  @ValidateIf((o: ProfileFieldsDto) => !!o.emergencyPhone)
  @Matches(PHONE_RULE, { message: '紧急联系人手机号格式不正确' })
  emergencyPhone?: string;
}

export class AppUserQueryDto {
  @IsOptional()
  @Type(() => Number)
  @Min(1, { message: '页码不能小于1' })
  pageNum?: number;

  @IsOptional()
  @Type(() => Number)
  @Min(1, { message: '每页条数必须在1到100之间' })
  @Max(100, { message: '每页条数必须在1到100之间' })
  pageSize?: number;

  @IsOptional()
  @IsString()
  userName?: string;

  @IsOptional()
  @IsString()
  nickName?: string;

  @IsOptional()
  @IsString()
  email?: string;

  @IsOptional()
  @IsString()
  phone?: string;

  @IsOptional()
  @IsIn(['0', '1', '2'])
  sex?: string;

  @IsOptional()
  @IsIn(['0', '1'])
  status?: string;

  @IsOptional()
  @IsString()
  beginTime?: string;

  @IsOptional()
  @IsString()
  endTime?: string;
}

export class AppUserCreateDto extends ProfileFieldsDto {
  @IsString()
  @Length(2, 30, { message: '用户名长度必须介于 2 和 30 之间' })
  userName!: string;

  @IsString()
  @IsNotEmpty({ message: '昵称不能为空' })
  @MaxLength(30)
  nickName!: string;

  @IsString()
  @Length(6, 32, { message: '密码长度必须介于 6 和 32 之间' })
  password!: string;

  @IsOptional()
  @ValidateIf((o: AppUserCreateDto) => !!o.email)
  @IsEmail({}, { message: '邮箱格式不正确' })
  email?: string;

  @IsOptional()
  @ValidateIf((o: AppUserCreateDto) => !!o.phone)
  @Matches(PHONE_RULE, { message: '手机号格式不正确' })
  phone?: string;

  @IsOptional()
  @IsIn(['0', '1', '2'])
  sex?: string;

  @IsOptional()
  @IsIn(['0', '1'])
  status?: string;

  @IsOptional()
  @IsString()
  remark?: string;
}

/** 未给出的字段保持不变。 */
export class AppUserUpdateDto extends ProfileFieldsDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: '昵称不能为空' })
  @MaxLength(30)
  nickName?: string;

  @IsOptional()
  @ValidateIf((o: AppUserUpdateDto) => !!o.email)
  @IsEmail({}, { message: '邮箱格式不正确' })
  email?: string;

  @IsOptional()
  @ValidateIf((o: AppUserUpdateDto) => !!o.phone)
  @Matches(PHONE_RULE, { message: '手机号格式不正确' })
  phone?: string;

  @IsOptional()
  @IsIn(['0', '1', '2'])
  sex?: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  avatar?: string;

  @IsOptional()
  @IsIn(['0', '1'])
  status?: string;

  @IsOptional()
  @IsString()
  remark?: string;
}

/** 本人修改资料时不允许改状态。 */
export class ProfileUpdateDto extends ProfileFieldsDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: '昵称不能为空' })
  @MaxLength(30)
  nickName?: string;

  @IsOptional()
  @ValidateIf((o: ProfileUpdateDto) => !!o.email)
  @IsEmail({}, { message: '邮箱格式不正确' })
  email?: string;

  @IsOptional()
  @ValidateIf((o: ProfileUpdateDto) => !!o.phone)
  @Matches(PHONE_RULE, { message: '手机号格式不正确' })
  phone?: string;

  @IsOptional()
  @IsIn(['0', '1', '2'])
  sex?: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  avatar?: string;
}

export class IdsDto {
  @IsArray()
  @Type(() => Number)
  @IsInt({ each: true })
  ids!: number[];
}

export class AppUserStatusDto {
  @IsIn(['0', '1'], { message: '状态不正确' })
  status!: string;
}

export class ResetPasswordDto {
  @IsString()
  @Length(6, 32, { message: '密码长度必须介于 6 和 32 之间' })
  password!: string;
}

export class LoginLogCleanDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  days?: number;
}

export class AppLoginDto {
  @IsString()
  @IsNotEmpty({ message: '用户名不能为空' })
  username!: string;

  @IsString()
  @IsNotEmpty({ message: '密码不能为空' })
  password!: string;
}

/** 注册的业务校验在服务层完成，以返回统一的提示。 */
export class AppRegisterDto {
  @IsString()
  @Length(2, 30, { message: '用户名长度必须介于 2 和 30 之间' })
  userName!: string;

  @IsString()
  @IsNotEmpty({ message: '密码不能为空' })
  password!: string;

  @IsString()
  @IsNotEmpty({ message: '确认密码不能为空' })
  confirmPassword!: string;

  @IsOptional()
  @IsString()
  @MaxLength(30)
  nickName?: string;

  @IsOptional()
  @ValidateIf((o: AppRegisterDto) => !!o.email)
  @IsEmail({}, { message: '邮箱格式不正确' })
  email?: string;

  @IsOptional()
  @IsString()
  phone?: string;
}

export class SmsSendDto {
  @IsString()
  @IsNotEmpty({ message: '手机号不能为空' })
  phone!: string;
}

export class ChangePasswordDto {
  @IsString()
  @IsNotEmpty({ message: '原密码不能为空' })
  oldPassword!: string;

  @IsString()
  @Length(6, 32, { message: '新密码长度必须介于 6 和 32 之间' })
  newPassword!: string;

  @IsString()
  @IsNotEmpty({ message: '确认密码不能为空' })
  confirmPassword!: string;
}

export class UserSearchDto {
  @IsOptional()
  @IsString()
  keyword?: string;

  @IsOptional()
  @Type(() => Number)
  pageNum?: number;

  @IsOptional()
  @Type(() => Number)
  pageSize?: number;
}

export interface AppUserResp {
  userId: number;
  userName: string;
  nickName: string;
  email: string;
  phone: string;
  sex: string;
  avatar: string;
  status: string;
  loginIp: string;
  loginDate: string;
  createTime: string;
  updateTime: string;
  remark: string;
}

/** 公开资料，不含登录信息。 */
export type AppUserPublicResp = Pick<AppUserResp, 'userId' | 'userName' | 'nickName' | 'avatar' | 'sex'>;

export interface AppUserDetailResp extends AppUserResp {
  profile: AppUserProfile | null;
}

export interface AppLoginResp {
  accessToken: string;
  tokenType: 'bearer';
  expiresIn: number;
  userInfo: AppUserResp;
}

export interface AppStatsResp {
  totalUsers: number;
  activeUsers: number;
  todayNewUsers: number;
  totalLoginLogs: number;
}
