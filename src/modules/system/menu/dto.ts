import { Type } from 'class-transformer';
import { IsIn, IsInt, IsNotEmpty, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export class MenuQueryDto {
  @IsOptional()
  @IsString()
  menuName?: string;

  @IsOptional()
  @IsIn(['0', '1'])
  status?: string;
}

export class MenuDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  menuId?: number;

  @IsString()
  @IsNotEmpty({ message: '菜单名称不能为空' })
  @MaxLength(50, { message: '菜单名称长度不能超过50个字符' })
  menuName!: string;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  parentId = 0;

  @Type(() => Number)
  @IsInt({ message: '显示顺序不能为空' })
  orderNum = 0;

  @IsOptional()
  @IsString()
  @MaxLength(200, { message: '路由地址不能超过200个字符' })
  path?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255, { message: '组件路径不能超过255个字符' })
  component?: string;

  @IsOptional()
  @IsString()
  query?: string;

  @IsOptional()
  @IsIn(['0', '1'])
  isFrame?: string;

  @IsOptional()
  @IsIn(['0', '1'])
  isCache?: string;

  @IsIn(['M', 'C', 'F'], { message: '菜单类型不正确' })
  menuType!: string;

  @IsOptional()
  @IsIn(['0', '1'])
  visible?: string;

  @IsOptional()
  @IsIn(['0', '1'])
  status?: string;

  @IsOptional()
  @IsString()
  @MaxLength(100, { message: '权限标识长度不能超过100个字符' })
  perms?: string;

  @IsOptional()
  @IsString()
  icon?: string;

  @IsOptional()
  @IsString()
  remark?: string;
}

/** 菜单树节点（treeselect）。 */
export interface TreeSelect {
  id: number;
  label: string;
  children?: TreeSelect[];
}

export interface MenuResp {
  menuId: number;
  menuName: string;
  parentId: number;
  orderNum: number;
  path: string;
  component: string;
  query: string;
  isFrame: string;
  isCache: string;
  menuType: string;
  visible: string;
  status: string;
  perms: string;
  icon: string;
  createTime: string;
  remark: string;
}

export interface RouterMeta {
  title: string;
  icon: string;
  noCache: boolean;
  link: string | null;
}

/** 前端路由结构，对应 /getRouters。 */
export interface RouterVo {
  name: string;
  path: string;
  hidden: boolean;
  component: string;
  query?: string;
  redirect?: string;
  alwaysShow?: boolean;
  meta: RouterMeta | null;
  children?: RouterVo[];
}
