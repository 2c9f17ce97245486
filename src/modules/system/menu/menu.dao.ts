import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../../../shared/database/database.service';
import { LIKE_ESCAPE, containsPattern } from '../../../shared/database/like';
import { MenuFields, MenuQuery, SysMenu } from './menu.entity';

interface SysMenuRow {
  menu_id: number;
  menu_name: string;
  parent_id: number;
  order_num: number;
  path: string | null;
  component: string | null;
  query: string | null;
  is_frame: string | null;
  is_cache: string | null;
  menu_type: string | null;
  visible: string | null;
  status: string | null;
  perms: string | null;
  icon: string | null;
  create_by: string | null;
  create_time: Date | null;
  update_by: string | null;
  update_time: Date | null;
  remark: string | null;
}

function toEntity(r: SysMenuRow): SysMenu {
  return {
    menuId: Number(r.menu_id),
    menuName: r.menu_name,
    parentId: Number(r.parent_id),
    orderNum: Number(r.order_num),
    path: r.path ?? '',
    component: r.component ?? '',
    query: r.query ?? '',
    isFrame: r.is_frame ?? '1',
    isCache: r.is_cache ?? '0',
    menuType: r.menu_type ?? '',
    visible: r.visible ?? '0',
    status: r.status ?? '0',
    perms: r.perms ?? '',
    icon: r.icon ?? '#',
    createBy: r.create_by ?? '',
    createTime: r.create_time,
    updateBy: r.update_by ?? '',
    updateTime: r.update_time,
    remark: r.remark ?? '',
  };
}

export abstract class SysMenuDao {
  abstract list(query: MenuQuery): Promise<SysMenu[]>;
  abstract listByUserId(userId: number, query: MenuQuery): Promise<SysMenu[]>;
  abstract findById(menuId: number): Promise<SysMenu | null>;
  abstract existsName(menuName: string, parentId: number, excludeId?: number): Promise<boolean>;
  abstract hasChildren(menuId: number): Promise<boolean>;
  abstract isAssigned(menuId: number): Promise<boolean>;
  abstract insert(menu: MenuFields, createBy: string): Promise<number>;
  abstract update(menuId: number, menu: MenuFields, updateBy: string): Promise<void>;
  abstract delete(menuId: number): Promise<void>;
  abstract permsByUserId(userId: number): Promise<string[]>;
}

const SELECT_MENU = `
SELECT DISTINCT m.menu_id, m.menu_name, m.parent_id, m.order_num, m.path, m.component,
       m.query, m.is_frame, m.is_cache, m.menu_type, m.visible, m.status,
       m.perms, m.icon, m.create_by, m.create_time, m.update_by, m.update_time, m.remark
FROM sys_menu AS m`;

function filters(query: MenuQuery, args: unknown[]): string {
  let where = '';
  if (query.menuName) {
    args.push(containsPattern(query.menuName));
    where += ` AND m.menu_name ILIKE $${args.length}${LIKE_ESCAPE}`;
  }
  if (query.status) {
    args.push(query.status);
    where += ` AND m.status = $${args.length}`;
  }
  return where;
}

@Injectable()
export class PgSysMenuDao extends SysMenuDao {
  constructor(private readonly db: DatabaseService) {
    super();
  }

  async list(query: MenuQuery): Promise<SysMenu[]> {
    const args: unknown[] = [];
    const where = filters(query, args);
    const { rows } = await this.db.query<SysMenuRow>(
      `${SELECT_MENU} WHERE 1=1 ${where} ORDER BY m.parent_id, m.order_num, m.menu_id`,
      args,
    );
    return rows.map(toEntity);
  }

  async listByUserId(userId: number, query: MenuQuery): Promise<SysMenu[]> {
    const args: unknown[] = [userId];
    const where = filters(query, args);
    const { rows } = await this.db.query<SysMenuRow>(
      `${SELECT_MENU}
JOIN sys_role_menu AS rm ON rm.menu_id = m.menu_id
JOIN sys_user_role AS ur ON ur.role_id = rm.role_id
JOIN sys_role AS r ON r.role_id = ur.role_id AND r.status = '0' AND r.del_flag = '0'
WHERE ur.user_id = $1 ${where}
ORDER BY m.parent_id, m.order_num, m.menu_id`,
      args,
    );
    return rows.map(toEntity);
  }

  async findById(menuId: number): Promise<SysMenu | null> {
    const { rows } = await this.db.query<SysMenuRow>(`${SELECT_MENU} WHERE m.menu_id = $1`, [menuId]);
    return rows.length ? toEntity(rows[0]) : null;
  }

  async existsName(menuName: string, parentId: number, excludeId = 0): Promise<boolean> {
    const { rows } = await this.db.query<{ menu_id: number }>(
      `SELECT menu_id FROM sys_menu WHERE menu_name = $1 AND parent_id = $2 AND menu_id <> $3 LIMIT 1`,
      [menuName, parentId, excludeId],
    );
    return rows.length > 0;
  }

  async hasChildren(menuId: number): Promise<boolean> {
    const { rows } = await this.db.query<{ menu_id: number }>(
      `SELECT menu_id FROM sys_menu WHERE parent_id = $1 LIMIT 1`,
      [menuId],
    );
    return rows.length > 0;
  }

  async isAssigned(menuId: number): Promise<boolean> {
    const { rows } = await this.db.query<{ role_id: number }>(
      `SELECT role_id FROM sys_role_menu WHERE menu_id = $1 LIMIT 1`,
      [menuId],
    );
    return rows.length > 0;
  }

  async insert(menu: MenuFields, createBy: string): Promise<number> {
    const { rows } = await this.db.query<{ menu_id: number }>(
      `
INSERT INTO sys_menu (
    menu_name, parent_id, order_num, path, component, query, is_frame, is_cache,
    menu_type, visible, status, perms, icon, remark, create_by, create_time
) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, NOW())
RETURNING menu_id`,
      [...this.values(menu), createBy],
    );
    return Number(rows[0].menu_id);
  }

  async update(menuId: number, menu: MenuFields, updateBy: string): Promise<void> {
    await this.db.query(
      `
UPDATE sys_menu
   SET menu_name = $1, parent_id = $2, order_num = $3, path = $4, component = $5,
       query = $6, is_frame = $7, is_cache = $8, menu_type = $9, visible = $10,
       status = $11, perms = $12, icon = $13, remark = $14,
       update_by = $15, update_time = NOW()
 WHERE menu_id = $16`,
      [...this.values(menu), updateBy, menuId],
    );
  }

  async delete(menuId: number): Promise<void> {
    await this.db.query(`DELETE FROM sys_menu WHERE menu_id = $1`, [menuId]);
  }

  async permsByUserId(userId: number): Promise<string[]> {
    const { rows } = await this.db.query<{ perms: string }>(
      `
SELECT DISTINCT m.perms
FROM sys_menu AS m
JOIN sys_role_menu AS rm ON rm.menu_id = m.menu_id
JOIN sys_user_role AS ur ON ur.role_id = rm.role_id
JOIN sys_role AS r ON r.role_id = ur.role_id AND r.status = '0' AND r.del_flag = '0'
WHERE ur.user_id = $1
  AND m.status = '0'
  AND COALESCE(m.perms, '') <> ''`,
      [userId],
    );
    return rows.map((r) => r.perms);
  }

  private values(menu: MenuFields): unknown[] {
    return [
      menu.menuName,
      menu.parentId,
      menu.orderNum,
      menu.path,
      menu.component,
      menu.query,
      menu.isFrame,
      menu.isCache,
      menu.menuType,
      menu.visible,
      menu.status,
      menu.perms,
      menu.icon,
      menu.remark,
    ];
  }
}
