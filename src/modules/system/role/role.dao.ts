import { Injectable } from '@nestjs/common';
import { DatabaseService, Queryable } from '../../../shared/database/database.service';
import { LIKE_ESCAPE, containsPattern } from '../../../shared/database/like';
import { PageParams } from '../../../shared/page/page';
import { NewSysRole, RoleQuery, SysRole, SysRolePatch, UniqueRoleField } from './role.entity';

interface SysRoleRow {
  role_id: number;
  role_name: string;
  role_key: string;
  role_sort: number;
  status: string;
  del_flag: string | null;
  create_by: string | null;
  create_time: Date | null;
  update_by: string | null;
  update_time: Date | null;
  remark: string | null;
}

function toEntity(r: SysRoleRow): SysRole {
  return {
    roleId: Number(r.role_id),
    roleName: r.role_name,
    roleKey: r.role_key,
    roleSort: Number(r.role_sort),
    status: r.status,
    delFlag: r.del_flag ?? '0',
    createBy: r.create_by ?? '',
    createTime: r.create_time,
    updateBy: r.update_by ?? '',
    updateTime: r.update_time,
    remark: r.remark ?? '',
  };
}

export abstract class SysRoleDao {
  abstract page(query: RoleQuery, page: PageParams): Promise<{ rows: SysRole[]; total: number }>;
  abstract listAll(): Promise<SysRole[]>;
  abstract findById(roleId: number): Promise<SysRole | null>;
  abstract listByUserId(userId: number): Promise<SysRole[]>;
  abstract existsBy(field: UniqueRoleField, value: string, excludeId?: number): Promise<boolean>;
  abstract insert(role: NewSysRole, menuIds: number[]): Promise<number>;
  abstract update(roleId: number, patch: SysRolePatch, menuIds?: number[]): Promise<void>;
  abstract softDelete(roleIds: number[], updateBy: string): Promise<number>;
  abstract countUsers(roleId: number): Promise<number>;
  abstract menuIdsOf(roleId: number): Promise<number[]>;
}

const SELECT_ROLE = `
SELECT r.role_id, r.role_name, r.role_key, r.role_sort, r.status, r.del_flag,
       r.create_by, r.create_time, r.update_by, r.update_time, r.remark
FROM sys_role AS r`;

@Injectable()
export class PgSysRoleDao extends SysRoleDao {
  constructor(private readonly db: DatabaseService) {
    super();
  }

  async page(query: RoleQuery, page: PageParams): Promise<{ rows: SysRole[]; total: number }> {
    let where = `WHERE r.del_flag = '0'`;
    const args: unknown[] = [];
    let argPos = 1;
    if (query.roleName) {
      where += ` AND r.role_name ILIKE $${argPos++}${LIKE_ESCAPE}`;
      args.push(containsPattern(query.roleName));
    }
    if (query.roleKey) {
      where += ` AND r.role_key ILIKE $${argPos++}${LIKE_ESCAPE}`;
      args.push(containsPattern(query.roleKey));
    }
    if (query.status) {
      where += ` AND r.status = $${argPos++}`;
      args.push(query.status);
    }
    const count = await this.db.query<{ total: string }>(
      `SELECT COUNT(*) AS total FROM sys_role AS r ${where}`,
      args,
    );
    const total = Number(count.rows[0]?.total ?? 0);
    if (!total) return { rows: [], total: 0 };
    const { rows } = await this.db.query<SysRoleRow>(
      `${SELECT_ROLE} ${where} ORDER BY r.role_sort ASC, r.role_id ASC LIMIT $${argPos} OFFSET $${argPos + 1}`,
      [...args, page.pageSize, page.offset],
    );
    return { rows: rows.map(toEntity), total };
  }

  async listAll(): Promise<SysRole[]> {
    const { rows } = await this.db.query<SysRoleRow>(
      `${SELECT_ROLE} WHERE r.del_flag = '0' ORDER BY r.role_sort ASC, r.role_id ASC`,
    );
    return rows.map(toEntity);
  }

  async findById(roleId: number): Promise<SysRole | null> {
    const { rows } = await this.db.query<SysRoleRow>(
      `${SELECT_ROLE} WHERE r.role_id = $1 AND r.del_flag = '0'`,
      [roleId],
    );
    return rows.length ? toEntity(rows[0]) : null;
  }

  async listByUserId(userId: number): Promise<SysRole[]> {
    const { rows } = await this.db.query<SysRoleRow>(
      `${SELECT_ROLE}
JOIN sys_user_role AS ur ON ur.role_id = r.role_id
WHERE ur.user_id = $1 AND r.del_flag = '0'
ORDER BY r.role_sort ASC`,
      [userId],
    );
    return rows.map(toEntity);
  }

  async existsBy(field: UniqueRoleField, value: string, excludeId = 0): Promise<boolean> {
    const { rows } = await this.db.query<{ role_id: number }>(
      `SELECT role_id FROM sys_role WHERE ${field} = $1 AND del_flag = '0' AND role_id <> $2 LIMIT 1`,
      [value, excludeId],
    );
    return rows.length > 0;
  }

  async insert(role: NewSysRole, menuIds: number[]): Promise<number> {
    return this.db.transaction(async (tx) => {
      const { rows } = await tx.query<{ role_id: number }>(
        `
INSERT INTO sys_role (role_name, role_key, role_sort, status, del_flag, create_by, create_time, remark)
VALUES ($1, $2, $3, $4, '0', $5, NOW(), $6)
RETURNING role_id`,
        [role.roleName, role.roleKey, role.roleSort, role.status, role.createBy, role.remark],
      );
      const roleId = Number(rows[0].role_id);
      await this.replaceMenus(tx, roleId, menuIds);
      return roleId;
    });
  }

  async update(roleId: number, patch: SysRolePatch, menuIds?: number[]): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.query(
        `
UPDATE sys_role
   SET role_name   = COALESCE($1, role_name),
       role_key    = COALESCE($2, role_key),
       role_sort   = COALESCE($3, role_sort),
       status      = COALESCE($4, status),
       remark      = COALESCE($5, remark),
       update_by   = $6,
       update_time = NOW()
 WHERE role_id = $7`,
        [
          patch.roleName ?? null,
          patch.roleKey ?? null,
          patch.roleSort ?? null,
          patch.status ?? null,
          patch.remark ?? null,
          patch.updateBy,
          roleId,
        ],
      );
      if (menuIds) {
        await this.replaceMenus(tx, roleId, menuIds);
      }
    });
  }

  async softDelete(roleIds: number[], updateBy: string): Promise<number> {
    return this.db.transaction(async (tx) => {
      await tx.query(`DELETE FROM sys_role_menu WHERE role_id = ANY($1::int[])`, [roleIds]);
      const result = await tx.query(
        `UPDATE sys_role SET del_flag = '2', update_by = $2, update_time = NOW()
          WHERE role_id = ANY($1::int[]) AND del_flag = '0'`,
        [roleIds, updateBy],
      );
      return result.rowCount ?? 0;
    });
  }

  async countUsers(roleId: number): Promise<number> {
    const { rows } = await this.db.query<{ total: string }>(
      `SELECT COUNT(*) AS total
         FROM sys_user_role AS ur
         JOIN sys_user AS u ON u.user_id = ur.user_id AND u.del_flag = '0'
        WHERE ur.role_id = $1`,
      [roleId],
    );
    return Number(rows[0]?.total ?? 0);
  }

  async menuIdsOf(roleId: number): Promise<number[]> {
    const { rows } = await this.db.query<{ menu_id: number }>(
      `SELECT menu_id FROM sys_role_menu WHERE role_id = $1 ORDER BY menu_id`,
      [roleId],
    );
    return rows.map((r) => Number(r.menu_id));
  }

  private async replaceMenus(tx: Queryable, roleId: number, menuIds: number[]): Promise<void> {
    await tx.query(`DELETE FROM sys_role_menu WHERE role_id = $1`, [roleId]);
    if (menuIds.length) {
      await tx.query(
        `INSERT INTO sys_role_menu (role_id, menu_id) SELECT $1, UNNEST($2::int[])`,
        [roleId, menuIds],
      );
    }
  }
}
