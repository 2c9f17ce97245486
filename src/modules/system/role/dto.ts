import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

export class RoleQueryDto {
  @IsOptional()
  @Type(() => Number)
  pageNum?: number;

  @IsOptional()
  @Type(() => Number)
  pageSize?: number;

  @IsOptional()
  @IsString()
  roleName?: string;

  @IsOptional()
  @IsString()
  roleKey?: string;

  @IsOptional()
  @IsIn(['0', '1'])
  status?: string;
}

export class RoleDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  roleId?: number;

  @IsString()
  @IsNotEmpty({ message: '角色名称不能为空' })
  @MaxLength(30, { message: '角色名称长度不能超过30个字符' })
  roleName!: string;

  @IsString()
  @IsNotEmpty({ message: '权限字符不能为空' })
  @MaxLength(100, { message: '权限字符长度不能超过100个字符' })
  roleKey!: string;

  @Type(() => Number)
  @IsInt({ message: '显示顺序不能为空' })
  roleSort = 0;

  @IsOptional()
  @IsIn(['0', '1'])
  status?: string;

  @IsOptional()
  @IsArray()
  @IsInt({ each: true })
  menuIds?: number[];

  @IsOptional()
  @IsString()
  remark?: string;
}

export class RoleStatusDto {
  @Type(() => Number)
  @IsInt()
  roleId!: number;

  @IsIn(['0', '1'], { message: '状态不正确' })
  status!: string;
}

export interface RoleResp {
  roleId: number;
  roleName: string;
  roleKey: string;
  roleSort: number;
  status: string;
  createTime: string;
  remark: string;
  admin: boolean;
}

export interface RoleDetailResp extends RoleResp {
  menuIds: number[];
}
