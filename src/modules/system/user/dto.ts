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
  MaxLength,
  ValidateIf,
} from 'class-validator';

export class UserQueryDto {
  @IsOptional()
  @Type(() => Number)
  pageNum?: number;

  @IsOptional()
  @Type(() => Number)
  pageSize?: number;

  @IsOptional()
  @IsString()
  userName?: string;

  @IsOptional()
  @IsString()
  phonenumber?: string;

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

export class UserDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  userId?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  deptId?: number;

  @IsString()
  @Length(2, 30, { message: '用户账号长度必须介于 2 和 30 之间' })
  userName!: string;

  @IsString()
  @IsNotEmpty({ message: '用户昵称不能为空' })
  @MaxLength(30, { message: '用户昵称长度不能超过30个字符' })
  nickName!: string;

  @IsOptional()
  @ValidateIf((o: UserDto) => !!o.email)
  @IsEmail({}, { message: '邮箱格式不正确' })
  email?: string;

  @IsOptional()
  @ValidateIf((o: UserDto) => !!o.phonenumber)
  @Matches(/^1[3-9]\d{9}$/, { message: '手机号码格式不正确' })
  phonenumber?: string;

  @IsOptional()
  @IsIn(['0', '1', '2'])
  sex?: string;

  @IsOptional()
  @IsString()
  password?: string;

  @IsOptional()
  @IsIn(['0', '1'])
  status?: string;

  @IsOptional()
  @IsArray()
  @IsInt({ each: true })
  roleIds?: number[];

  @IsOptional()
  @IsString()
  remark?: string;
}

export class ResetPwdDto {
  @Type(() => Number)
  @IsInt()
  userId!: number;

  @IsString()
  @IsNotEmpty({ message: '密码不能为空' })
  password!: string;
}

export class UserStatusDto {
  @Type(() => Number)
  @IsInt()
  userId!: number;

  @IsIn(['0', '1'], { message: '状态不正确' })
  status!: string;
}

export interface UserResp {
  userId: number;
  deptId: number | null;
  userName: string;
  nickName: string;
  email: string;
  phonenumber: string;
  sex: string;
  avatar: string;
  status: string;
  loginIp: string;
  loginDate: string;
  createBy: string;
  createTime: string;
  remark: string;
  admin: boolean;
}
