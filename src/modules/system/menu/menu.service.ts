import { Injectable } from '@nestjs/common';
import { ServiceWarning } from '../../../shared/exception/exceptions';
import { formatDateTime } from '../../../shared/time/time';
import { LoginUser } from '../../auth/login-user';
import { SysRoleDao } from '../role/role.dao';
import { SUPER_ADMIN_ID } from '../user/user.entity';
import { MenuDto, MenuResp, RouterVo, TreeSelect } from './dto';
import { SysMenuDao } from './menu.dao';
import { MenuFields, MenuQuery, SysMenu } from './menu.entity';

/** 拥有全部权限的通配标识。 */
export const ALL_PERMISSION = '*:*:*';

interface MenuNode extends SysMenu {
  children: MenuNode[];
}

export function isHttp(path: string): boolean {
  return path.startsWith('http://') || path.startsWith('https://');
}

function capitalize(s: string): string {
  return s ? s.charAt(0).toUpperCase() + s.slice(1) : s;
}

/** 一级菜单且非外链的 C 类型，作为 Layout 下的单页。 */
function isMenuFrame(m: SysMenu): boolean {
  return m.parentId === 0 && m.menuType === 'C' && m.isFrame === '1';
}

function isInnerLink(m: SysMenu): boolean {
  return m.isFrame === '1' && isHttp(m.path);
}

function isParentView(m: SysMenu): boolean {
  return m.parentId !== 0 && m.menuType === 'M';
}

function innerLinkReplaceEach(path: string): string {
  return path
    .replace(/^https?:\/\//, '')
    .replace(/^www\./, '')
    .replace(/[.:]/g, '/');
}

function routeName(m: SysMenu): string {
  return isMenuFrame(m) ? '' : capitalize(m.path);
}

function routerPath(m: SysMenu): string {
  let path = m.path;
  if (m.parentId !== 0 && isInnerLink(m)) {
    path = innerLinkReplaceEach(path);
  }
  if (m.parentId === 0 && m.menuType === 'M' && m.isFrame === '1') {
    path = `/${m.path}`;
  } else if (isMenuFrame(m)) {
    path = '/';
  }
  return path;
}

function componentOf(m: SysMenu): string {
  if (m.component && !isMenuFrame(m)) return m.component;
  if (!m.component && m.parentId !== 0 && isInnerLink(m)) return 'InnerLink';
  if (!m.component && isParentView(m)) return 'ParentView';
  return 'Layout';
}

function byOrder(a: SysMenu, b: SysMenu): number {
  return a.orderNum === b.orderNum ? a.menuId - b.menuId : a.orderNum - b.orderNum;
}

/**
 * 扁平菜单 → 树。父节点不在列表中的节点作为根节点，子节点按 orderNum、menuId 排序。
 */
export function buildMenuTree(menus: SysMenu[]): MenuNode[] {
  const nodeMap = new Map<number, MenuNode>();
  for (const m of [...menus].sort(byOrder)) {
    nodeMap.set(m.menuId, { ...m, children: [] });
  }
  const roots: MenuNode[] = [];
  for (const node of nodeMap.values()) {
    const parent = node.parentId === 0 ? undefined : nodeMap.get(node.parentId);
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
  }
  return roots;
}

export function toTreeSelect(nodes: MenuNode[]): TreeSelect[] {
  return nodes.map((n) => {
    const item: TreeSelect = { id: n.menuId, label: n.menuName };
    if (n.children.length) item.children = toTreeSelect(n.children);
    return item;
  });
}

/**
 * 菜单树 → 前端路由。
 */
export function buildRouters(nodes: MenuNode[]): RouterVo[] {
  return nodes.map((m) => {
    const router: RouterVo = {
      name: routeName(m),
      path: routerPath(m),
      hidden: m.visible === '1',
      component: componentOf(m),
      query: m.query || undefined,
      meta: {
        title: m.menuName,
        icon: m.icon,
        noCache: m.isCache === '1',
        link: isHttp(m.path) ? m.path : null,
      },
    };
    if (m.children.length && m.menuType === 'M') {
      router.alwaysShow = true;
      router.redirect = 'noRedirect';
      router.children = buildRouters(m.children);
    } else if (isMenuFrame(m)) {
      router.meta = null;
      router.children = [
        {
          name: capitalize(m.path),
          path: m.path,
          hidden: false,
          component: m.component,
          query: m.query || undefined,
          meta: { title: m.menuName, icon: m.icon, noCache: m.isCache === '1', link: null },
        },
      ];
    } else if (m.parentId === 0 && isInnerLink(m)) {
      const inner = innerLinkReplaceEach(m.path);
      router.meta = { title: m.menuName, icon: m.icon, noCache: false, link: null };
      router.path = '/';
      router.children = [
        {
          name: capitalize(inner),
          path: inner,
          hidden: false,
          component: 'InnerLink',
          meta: { title: m.menuName, icon: m.icon, noCache: false, link: m.path },
        },
      ];
    }
    return router;
  });
}

function toResp(m: SysMenu): MenuResp {
  return {
    menuId: m.menuId,
    menuName: m.menuName,
    parentId: m.parentId,
    orderNum: m.orderNum,
    path: m.path,
    component: m.component,
    query: m.query,
    isFrame: m.isFrame,
    isCache: m.isCache,
    menuType: m.menuType,
    visible: m.visible,
    status: m.status,
    perms: m.perms,
    icon: m.icon,
    createTime: formatDateTime(m.createTime),
    remark: m.remark,
  };
}

@Injectable()
export class MenuService {
  constructor(
    private readonly menuDao: SysMenuDao,
    private readonly roleDao: SysRoleDao,
  ) {}

  /** 超级管理员可见全部菜单，其余用户按角色授权过滤。 */
  async listMenus(userId: number, query: MenuQuery = {}): Promise<SysMenu[]> {
    return userId === SUPER_ADMIN_ID
      ? this.menuDao.list(query)
      : this.menuDao.listByUserId(userId, query);
  }

  async list(user: LoginUser, query: MenuQuery): Promise<MenuResp[]> {
    const menus = await this.listMenus(user.userId, query);
    return menus.map(toResp);
  }

  async treeselect(user: LoginUser): Promise<TreeSelect[]> {
    return toTreeSelect(buildMenuTree(await this.listMenus(user.userId)));
  }

  async roleMenuTreeselect(
    user: LoginUser,
    roleId: number,
  ): Promise<{ menus: TreeSelect[]; checkedKeys: number[] }> {
    const menus = await this.treeselect(user);
    const checkedKeys = await this.roleDao.menuIdsOf(roleId);
    return { menus, checkedKeys };
  }

  /** 当前用户可见的目录与菜单（不含按钮、停用项）。 */
  async routers(userId: number): Promise<RouterVo[]> {
    const menus = (await this.listMenus(userId, { status: '0' })).filter(
      (m) => m.menuType === 'M' || m.menuType === 'C',
    );
    return buildRouters(buildMenuTree(menus));
  }

  async permissions(userId: number): Promise<string[]> {
    if (userId === SUPER_ADMIN_ID) return [ALL_PERMISSION];
    return this.menuDao.permsByUserId(userId);
  }

  async get(menuId: number): Promise<MenuResp> {
    const menu = await this.menuDao.findById(menuId);
    if (!menu) throw new ServiceWarning('菜单不存在');
    return toResp(menu);
  }

  async add(dto: MenuDto, user: LoginUser): Promise<number> {
    const fields = this.toFields(dto);
    if (await this.menuDao.existsName(fields.menuName, fields.parentId)) {
      throw new ServiceWarning(`新增菜单'${fields.menuName}'失败，菜单名称已存在`);
    }
    if (fields.isFrame === '0' && !isHttp(fields.path)) {
      throw new ServiceWarning(`新增菜单'${fields.menuName}'失败，地址必须以http(s)://开头`);
    }
    return this.menuDao.insert(fields, user.userName);
  }

  async edit(dto: MenuDto, user: LoginUser): Promise<void> {
    const menuId = dto.menuId ?? 0;
    if (!(await this.menuDao.findById(menuId))) {
      throw new ServiceWarning('菜单不存在');
    }
    const fields = this.toFields(dto);
    if (await this.menuDao.existsName(fields.menuName, fields.parentId, menuId)) {
      throw new ServiceWarning(`修改菜单'${fields.menuName}'失败，菜单名称已存在`);
    }
    if (fields.isFrame === '0' && !isHttp(fields.path)) {
      throw new ServiceWarning(`修改菜单'${fields.menuName}'失败，地址必须以http(s)://开头`);
    }
    if (fields.parentId === menuId) {
      throw new ServiceWarning(`修改菜单'${fields.menuName}'失败，上级菜单不能选择自己`);
    }
    await this.menuDao.update(menuId, fields, user.userName);
  }

  async remove(menuId: number): Promise<void> {
    if (await this.menuDao.hasChildren(menuId)) {
      throw new ServiceWarning('存在子菜单,不允许删除');
    }
    if (await this.menuDao.isAssigned(menuId)) {
      throw new ServiceWarning('菜单已分配,不允许删除');
    }
    await this.menuDao.delete(menuId);
  }

  private toFields(dto: MenuDto): MenuFields {
    return {
      menuName: dto.menuName.trim(),
      parentId: dto.parentId,
      orderNum: dto.orderNum,
      path: (dto.path ?? '').trim(),
      component: (dto.component ?? '').trim(),
      query: dto.query ?? '',
      isFrame: dto.isFrame ?? '1',
      isCache: dto.isCache ?? '0',
      menuType: dto.menuType,
      visible: dto.visible ?? '0',
      status: dto.status ?? '0',
      perms: dto.perms ?? '',
      icon: dto.icon ?? '#',
      remark: dto.remark ?? '',
    };
  }
}
