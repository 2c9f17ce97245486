import { IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { UserResp } from '../../system/user/dto';

/**
 * 管理端登录请求。
 */
export class LoginDto {
  @IsString()
  @IsNotEmpty({ message: '用户名不能为空' })
  username!: string;

  @IsString()
  @IsNotEmpty({ message: '密码不能为空' })
  password!: string;

  @IsOptional()
  @IsString()
  code?: string;

  @IsOptional()
  @IsString()
  uuid?: string;
}

export interface LoginResp {
  token: string;
}

export interface UserInfoResp {
  user: UserResp;
  roles: string[];
  permissions: string[];
}
