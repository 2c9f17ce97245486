import { Injectable } from '@nestjs/common';
import { DatabaseService, Queryable } from '../../../shared/database/database.service';
import { LIKE_ESCAPE, containsPattern } from '../../../shared/database/like';
import { PageParams } from '../../../shared/page/page';
import {
  NewSysUser,
  SysUser,
  SysUserPatch,
  UniqueUserField,
  UserQuery,
} from './user.entity';

interface SysUserRow {
  user_id: number;
  dept_id: number | null;
  user_name: string;
  nick_name: string;
  email: string | null;
  phonenumber: string | null;
  sex: string | null;
  avatar: string | null;
  password: string | null;
  status: string | null;
  del_flag: string | null;
  login_ip: string | null;
  login_date: Date | null;
  create_by: string | null;
  create_time: Date | null;
  update_by: string | null;
  update_time: Date | null;
  remark: string | null;
}

function toEntity(r: SysUserRow): SysUser {
  return {
    userId: Number(r.user_id),
    deptId: r.dept_id === null ? null : Number(r.dept_id),
    userName: r.user_name,
    nickName: r.nick_name,
    email: r.email ?? '',
    phonenumber: r.phonenumber ?? '',
    sex: r.sex ?? '0',
    avatar: r.avatar ?? '',
    password: r.password ?? '',
    status: r.status ?? '0',
    delFlag: r.del_flag ?? '0',
    loginIp: r.login_ip ?? '',
    loginDate: r.login_date,
    createBy: r.create_by ?? '',
    createTime: r.create_time,
    updateBy: r.update_by ?? '',
    updateTime: r.update_time,
    remark: r.remark ?? '',
  };
}

/**
 * 系统用户数据访问接口。
 */
export abstract class SysUserDao {
  abstract page(query: UserQuery, page: PageParams): Promise<{ rows: SysUser[]; total: number }>;
  abstract findById(userId: number): Promise<SysUser | null>;
  abstract findByUserName(userName: string): Promise<SysUser | null>;
  abstract existsBy(field: UniqueUserField, value: string, excludeId?: number): Promise<boolean>;
  abstract insert(user: NewSysUser, roleIds: number[]): Promise<number>;
  abstract update(userId: number, patch: SysUserPatch, roleIds?: number[]): Promise<void>;
  abstract softDelete(userIds: number[], updateBy: string): Promise<number>;
  abstract updatePassword(userId: number, password: string, updateBy: string): Promise<void>;
  abstract updateStatus(userId: number, status: string, updateBy: string): Promise<void>;
  abstract updateLoginInfo(userId: number, ip: string, loginDate: Date): Promise<void>;
  abstract roleIdsOf(userId: number): Promise<number[]>;
}

const SELECT_USER = `
SELECT u.user_id, u.dept_id, u.user_name, u.nick_name, u.email, u.phonenumber,
       u.sex, u.avatar, u.password, u.status, u.del_flag, u.login_ip, u.login_date,
       u.create_by, u.create_time, u.update_by, u.update_time, u.remark
FROM sys_user AS u`;

@Injectable()
export class PgSysUserDao extends SysUserDao {
  constructor(private readonly db: DatabaseService) {
    super();
  }

  async page(query: UserQuery, page: PageParams): Promise<{ rows: SysUser[]; total: number }> {
    let where = `WHERE u.del_flag = '0'`;
    const args: unknown[] = [];
    let argPos = 1;

    if (query.userName) {
      where += ` AND u.user_name ILIKE $${argPos++}${LIKE_ESCAPE}`;
      args.push(containsPattern(query.userName));
    }
    if (query.phonenumber) {
      where += ` AND u.phonenumber ILIKE $${argPos++}${LIKE_ESCAPE}`;
      args.push(containsPattern(query.phonenumber));
    }
    if (query.status) {
      where += ` AND u.status = $${argPos++}`;
      args.push(query.status);
    }
    if (query.beginTime) {
      where += ` AND u.create_time >= $${argPos++}`;
      args.push(query.beginTime);
    }
    if (query.endTime) {
      where += ` AND u.create_time <= $${argPos++}`;
      args.push(query.endTime);
    }

    const count = await this.db.query<{ total: string }>(
      `SELECT COUNT(*) AS total FROM sys_user AS u ${where}`,
      args,
    );
    const total = Number(count.rows[0]?.total ?? 0);
    if (!total) return { rows: [], total: 0 };

    const { rows } = await this.db.query<SysUserRow>(
      `${SELECT_USER} ${where} ORDER BY u.user_id ASC LIMIT $${argPos} OFFSET $${argPos + 1}`,
      [...args, page.pageSize, page.offset],
    );
    return { rows: rows.map(toEntity), total };
  }

  async findById(userId: number): Promise<SysUser | null> {
    const { rows } = await this.db.query<SysUserRow>(
      `${SELECT_USER} WHERE u.user_id = $1 AND u.del_flag = '0'`,
      [userId],
    );
    return rows.length ? toEntity(rows[0]) : null;
  }

  async findByUserName(userName: string): Promise<SysUser | null> {
    const { rows } = await this.db.query<SysUserRow>(
      `${SELECT_USER} WHERE u.user_name = $1 AND u.del_flag = '0' LIMIT 1`,
      [userName],
    );
    return rows.length ? toEntity(rows[0]) : null;
  }

  async existsBy(field: UniqueUserField, value: string, excludeId = 0): Promise<boolean> {
    const { rows } = await this.db.query<{ user_id: number }>(
      `SELECT user_id FROM sys_user WHERE ${field} = $1 AND del_flag = '0' AND user_id <> $2 LIMIT 1`,
      [value, excludeId],
    );
    return rows.length > 0;
  }

  async insert(user: NewSysUser, roleIds: number[]): Promise<number> {
    return this.db.transaction(async (tx) => {
      const { rows } = await tx.query<{ user_id: number }>(
        `
INSERT INTO sys_user (
    dept_id, user_name, nick_name, email, phonenumber, sex,
    password, status, del_flag, create_by, create_time, remark
) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, '0', $9, NOW(), $10)
RETURNING user_id`,
        [
          user.deptId ?? null,
          user.userName,
          user.nickName,
          user.email,
          user.phonenumber,
          user.sex,
          user.password,
          user.status,
          user.createBy,
          user.remark,
        ],
      );
      const userId = Number(rows[0].user_id);
      await this.replaceRoles(tx, userId, roleIds);
      return userId;
    });
  }

  async update(userId: number, patch: SysUserPatch, roleIds?: number[]): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.query(
        `
UPDATE sys_user
   SET nick_name   = COALESCE($1, nick_name),
       email       = COALESCE($2, email),
       phonenumber = COALESCE($3, phonenumber),
       sex         = COALESCE($4, sex),
       status      = COALESCE($5, status),
       remark      = COALESCE($6, remark),
       dept_id     = COALESCE($7, dept_id),
       avatar      = COALESCE($8, avatar),
       update_by   = $9,
       update_time = NOW()
 WHERE user_id = $10`,
        [
          patch.nickName ?? null,
          patch.email ?? null,
          patch.phonenumber ?? null,
          patch.sex ?? null,
          patch.status ?? null,
          patch.remark ?? null,
          patch.deptId ?? null,
          patch.avatar ?? null,
          patch.updateBy,
          userId,
        ],
      );
      if (roleIds) {
        await this.replaceRoles(tx, userId, roleIds);
      }
    });
  }

  async softDelete(userIds: number[], updateBy: string): Promise<number> {
    const result = await this.db.query(
      `UPDATE sys_user SET del_flag = '2', update_by = $2, update_time = NOW()
        WHERE user_id = ANY($1::int[]) AND del_flag = '0'`,
      [userIds, updateBy],
    );
    return result.rowCount ?? 0;
  }

  async updatePassword(userId: number, password: string, updateBy: string): Promise<void> {
    await this.db.query(
      `UPDATE sys_user SET password = $1, update_by = $2, update_time = NOW() WHERE user_id = $3`,
      [password, updateBy, userId],
    );
  }

  async updateStatus(userId: number, status: string, updateBy: string): Promise<void> {
    await this.db.query(
      `UPDATE sys_user SET status = $1, update_by = $2, update_time = NOW() WHERE user_id = $3`,
      [status, updateBy, userId],
    );
  }

  async updateLoginInfo(userId: number, ip: string, loginDate: Date): Promise<void> {
    await this.db.query(
      `UPDATE sys_user SET login_ip = $1, login_date = $2 WHERE user_id = $3`,
      [ip, loginDate, userId],
    );
  }

  async roleIdsOf(userId: number): Promise<number[]> {
    const { rows } = await this.db.query<{ role_id: number }>(
      `SELECT role_id FROM sys_user_role WHERE user_id = $1 ORDER BY role_id`,
      [userId],
    );
    return rows.map((r) => Number(r.role_id));
  }

  private async replaceRoles(tx: Queryable, userId: number, roleIds: number[]): Promise<void> {
    await tx.query(`DELETE FROM sys_user_role WHERE user_id = $1`, [userId]);
    if (roleIds.length) {
      await tx.query(
        `INSERT INTO sys_user_role (user_id, role_id) SELECT $1, UNNEST($2::int[])`,
        [userId, roleIds],
      );
    }
  }
}
