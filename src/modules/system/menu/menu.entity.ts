/** 菜单类型：M 目录，C 菜单，F 按钮。 */
export type MenuType = 'M' | 'C' | 'F';

export interface SysMenu {
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
  createBy: string;
  createTime: Date | null;
  updateBy: string;
  updateTime: Date | null;
  remark: string;
}

export type MenuFields = Omit<SysMenu, 'menuId' | 'createBy' | 'createTime' | 'updateBy' | 'updateTime'>;

export interface MenuQuery {
  menuName?: string;
  status?: string;
}
