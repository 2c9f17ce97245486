import { Injectable } from '@nestjs/common';
import { DatabaseService, Queryable } from '../../shared/database/database.service';
import { LIKE_ESCAPE, containsPattern } from '../../shared/database/like';
import { PageParams } from '../../shared/page/page';
import {
  AppUser,
  AppUserPatch,
  AppUserProfile,
  AppUserQuery,
  AppUserStats,
  NewAppUser,
  PROFILE_FIELDS,
  ProfileField,
  UniqueAppUserField,
} from './app-user.entity';

/**
 * App 用户仓储，资料表随用户级联删除。
 */
export abstract class AppUserDao {
  abstract page(query: AppUserQuery, page: PageParams): Promise<{ rows: AppUser[]; total: number }>;
  abstract findById(userId: number): Promise<AppUser | null>;
  abstract findByUserName(userName: string): Promise<AppUser | null>;
  /** 用户名或邮箱登录。 */
  abstract findByAccount(account: string): Promise<AppUser | null>;
  abstract existsBy(field: UniqueAppUserField, value: string, excludeUserId?: number): Promise<boolean>;
  abstract insert(user: NewAppUser, profile: Partial<AppUserProfile> | null): Promise<number>;
  abstract update(userId: number, patch: AppUserPatch): Promise<void>;
  abstract findProfile(userId: number): Promise<AppUserProfile | null>;
  abstract upsertProfile(userId: number, profile: Partial<AppUserProfile>): Promise<void>;
  abstract deleteByIds(userIds: number[]): Promise<number>;
  abstract updatePassword(userId: number, password: string, updateBy: string): Promise<void>;
  abstract updateLoginInfo(userId: number, ip: string, loginDate: Date): Promise<void>;
  /** 仅正常状态用户，按用户名、昵称模糊匹配。 */
  abstract search(keyword: string, page: PageParams): Promise<{ rows: AppUser[]; total: number }>;
  abstract stats(todayStart: Date): Promise<AppUserStats>;
}

interface AppUserRow {
  user_id: number;
  user_name: string;
  nick_name: string;
  email: string | null;
  phone: string | null;
  sex: string | null;
  avatar: string | null;
  password: string;
  status: string | null;
  login_ip: string | null;
  login_date: Date | null;
  create_by: string | null;
  create_time: Date | null;
  update_by: string | null;
  update_time: Date | null;
  remark: string | null;
}

interface ProfileRow {
  real_name: string | null;
  id_card: string | null;
  birthday: string | null;
  address: string | null;
  education: string | null;
  occupation: string | null;
  income_level: string | null;
  marital_status: string | null;
  emergency_contact: string | null;
  emergency_phone: string | null;
}

const USER_COLUMNS = `user_id, user_name, nick_name, email, phone, sex, avatar, password, status,
  login_ip, login_date, create_by, create_time, update_by, update_time, remark`;

const PROFILE_COLUMNS: Record<ProfileField, string> = {
  realName: 'real_name',
  idCard: 'id_card',
  birthday: 'birthday',
  address: 'address',
  education: 'education',
  occupation: 'occupation',
  incomeLevel: 'income_level',
  maritalStatus: 'marital_status',
  emergencyContact: 'emergency_contact',
  emergencyPhone: 'emergency_phone',
};

function toAppUser(r: AppUserRow): AppUser {
  return {
    userId: Number(r.user_id),
    userName: r.user_name,
    nickName: r.nick_name,
    email: r.email ?? '',
    phone: r.phone ?? '',
    sex: r.sex ?? '0',
    avatar: r.avatar ?? '',
    password: r.password,
    status: r.status ?? '0',
    loginIp: r.login_ip ?? '',
    loginDate: r.login_date,
    createBy: r.create_by ?? '',
    createTime: r.create_time,
    updateBy: r.update_by ?? '',
    updateTime: r.update_time,
    remark: r.remark ?? '',
  };
}

function toProfile(r: ProfileRow): AppUserProfile {
  return {
    realName: r.real_name,
    idCard: r.id_card,
    birthday: r.birthday,
    address: r.address,
    education: r.education,
    occupation: r.occupation,
    incomeLevel: r.income_level,
    maritalStatus: r.marital_status,
    emergencyContact: r.emergency_contact,
    emergencyPhone: r.emergency_phone,
  };
}

function definedProfileFields(profile: Partial<AppUserProfile>): ProfileField[] {
  return PROFILE_FIELDS.filter((f) => profile[f] !== undefined);
}

@Injectable()
export class PgAppUserDao extends AppUserDao {
  constructor(private readonly db: DatabaseService) {
    super();
  }

  async page(query: AppUserQuery, page: PageParams): Promise<{ rows: AppUser[]; total: number }> {
    let where = 'WHERE 1=1';
    const args: unknown[] = [];
    let argPos = 1;
    const likes: Array<[string, string | undefined]> = [
      ['user_name', query.userName],
      ['nick_name', query.nickName],
      ['email', query.email],
      ['phone', query.phone],
    ];
    for (const [column, value] of likes) {
      if (value) {
        where += ` AND ${column} ILIKE $${argPos++}${LIKE_ESCAPE}`;
        args.push(containsPattern(value));
      }
    }
    if (query.sex) {
      where += ` AND sex = $${argPos++}`;
      args.push(query.sex);
    }
    if (query.status) {
      where += ` AND status = $${argPos++}`;
      args.push(query.status);
    }
    if (query.beginTime) {
      where += ` AND create_time >= $${argPos++}`;
      args.push(query.beginTime);
    }
    if (query.endTime) {
      where += ` AND create_time <= $${argPos++}`;
      args.push(query.endTime);
    }
    return this.pageWhere(where, args, argPos, page);
  }

  async findById(userId: number): Promise<AppUser | null> {
    return this.findOne('user_id = $1', [userId]);
  }

  async findByUserName(userName: string): Promise<AppUser | null> {
    return this.findOne('user_name = $1', [userName]);
  }

  async findByAccount(account: string): Promise<AppUser | null> {
    return this.findOne(`user_name = $1 OR (email <> '' AND email = $1)`, [account]);
  }

  async existsBy(field: UniqueAppUserField, value: string, excludeUserId?: number): Promise<boolean> {
    const args: unknown[] = [value];
    let sql = `SELECT 1 FROM app_user WHERE ${field} = $1`;
    if (excludeUserId !== undefined) {
      sql += ' AND user_id <> $2';
      args.push(excludeUserId);
    }
    const { rows } = await this.db.query(`${sql} LIMIT 1`, args);
    return rows.length > 0;
  }

  async insert(user: NewAppUser, profile: Partial<AppUserProfile> | null): Promise<number> {
    return this.db.transaction(async (tx) => {
      const { rows } = await tx.query<{ user_id: number }>(
        `INSERT INTO app_user (user_name, nick_name, email, phone, sex, avatar, password, status,
           create_by, create_time, remark)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, NOW(), $10)
         RETURNING user_id`,
        [
          user.userName,
          user.nickName,
          user.email,
          user.phone,
          user.sex,
          user.avatar ?? '',
          user.password,
          user.status,
          user.createBy,
          user.remark ?? null,
        ],
      );
      const userId = Number(rows[0]?.user_id);
      if (profile && definedProfileFields(profile).length) {
        await this.writeProfile(tx, userId, profile);
      }
      return userId;
    });
  }

  async update(userId: number, patch: AppUserPatch): Promise<void> {
    await this.db.query(
      `UPDATE app_user
          SET nick_name = COALESCE($2, nick_name),
              email = COALESCE($3, email),
              phone = COALESCE($4, phone),
              sex = COALESCE($5, sex),
              avatar = COALESCE($6, avatar),
              status = COALESCE($7, status),
              remark = COALESCE($8, remark),
              update_by = $9,
              update_time = NOW()
        WHERE user_id = $1`,
      [
        userId,
        patch.nickName ?? null,
        patch.email ?? null,
        patch.phone ?? null,
        patch.sex ?? null,
        patch.avatar ?? null,
        patch.status ?? null,
        patch.remark ?? null,
        patch.updateBy,
      ],
    );
  }

  async findProfile(userId: number): Promise<AppUserProfile | null> {
    const { rows } = await this.db.query<ProfileRow>(
      `SELECT real_name, id_card, TO_CHAR(birthday, 'YYYY-MM-DD') AS birthday, address, education,
              occupation, income_level, marital_status, emergency_contact, emergency_phone
         FROM app_user_profile WHERE user_id = $1`,
      [userId],
    );
    return rows[0] ? toProfile(rows[0]) : null;
  }

  async upsertProfile(userId: number, profile: Partial<AppUserProfile>): Promise<void> {
    if (!definedProfileFields(profile).length) return;
    await this.writeProfile(this.db, userId, profile);
  }

  async deleteByIds(userIds: number[]): Promise<number> {
    const result = await this.db.query(
      'DELETE FROM app_user WHERE user_id = ANY($1::int[])',
      [userIds],
    );
    return result.rowCount ?? 0;
  }

  async updatePassword(userId: number, password: string, updateBy: string): Promise<void> {
    await this.db.query(
      'UPDATE app_user SET password = $2, update_by = $3, update_time = NOW() WHERE user_id = $1',
      [userId, password, updateBy],
    );
  }

  async updateLoginInfo(userId: number, ip: string, loginDate: Date): Promise<void> {
    await this.db.query(
      'UPDATE app_user SET login_ip = $2, login_date = $3 WHERE user_id = $1',
      [userId, ip.slice(0, 128), loginDate],
    );
  }

  async search(keyword: string, page: PageParams): Promise<{ rows: AppUser[]; total: number }> {
    return this.pageWhere(
      `WHERE status = '0' AND (user_name ILIKE $1${LIKE_ESCAPE} OR nick_name ILIKE $1${LIKE_ESCAPE})`,
      [containsPattern(keyword)],
      2,
      page,
    );
  }

  async stats(todayStart: Date): Promise<AppUserStats> {
    const { rows } = await this.db.query<{ total: string; active: string; today: string }>(
      `SELECT COUNT(*) AS total,
              COUNT(*) FILTER (WHERE status = '0') AS active,
              COUNT(*) FILTER (WHERE create_time >= $1) AS today
         FROM app_user`,
      [todayStart],
    );
    const r = rows[0];
    return {
      totalUsers: Number(r?.total ?? 0),
      activeUsers: Number(r?.active ?? 0),
      todayNewUsers: Number(r?.today ?? 0),
    };
  }

  private async findOne(condition: string, args: unknown[]): Promise<AppUser | null> {
    const { rows } = await this.db.query<AppUserRow>(
      `SELECT ${USER_COLUMNS} FROM app_user WHERE ${condition} LIMIT 1`,
      args,
    );
    return rows[0] ? toAppUser(rows[0]) : null;
  }

  private async pageWhere(
    where: string,
    args: unknown[],
    argPos: number,
    page: PageParams,
  ): Promise<{ rows: AppUser[]; total: number }> {
    const count = await this.db.query<{ total: string }>(
      `SELECT COUNT(*) AS total FROM app_user ${where}`,
      args,
    );
    const total = Number(count.rows[0]?.total ?? 0);
    if (!total) return { rows: [], total: 0 };
    const { rows } = await this.db.query<AppUserRow>(
      `SELECT ${USER_COLUMNS} FROM app_user ${where}
        ORDER BY create_time DESC, user_id DESC
        LIMIT $${argPos} OFFSET $${argPos + 1}`,
      [...args, page.pageSize, page.offset],
    );
    return { rows: rows.map(toAppUser), total };
  }

  /** INSERT ... ON CONFLICT (user_id) DO UPDATE，只写入给出的字段。 */
  private async writeProfile(db: Queryable, userId: number, profile: Partial<AppUserProfile>): Promise<void> {
    const fields = definedProfileFields(profile);
    const columns = fields.map((f) => PROFILE_COLUMNS[f]);
    const values = fields.map((f) => profile[f] ?? null);
    const placeholders = fields.map((_, i) => `$${i + 2}`);
    const updates = columns.map((c) => `${c} = EXCLUDED.${c}`);
    await db.query(
      `INSERT INTO app_user_profile (user_id, ${columns.join(', ')}, create_time)
       VALUES ($1, ${placeholders.join(', ')}, NOW())
       ON CONFLICT (user_id) DO UPDATE SET ${updates.join(', ')}, update_time = NOW()`,
      [userId, ...values],
    );
  }
}
