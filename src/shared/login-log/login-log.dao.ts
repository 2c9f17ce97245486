import { DatabaseService } from '../database/database.service';
import { LIKE_ESCAPE, containsPattern } from '../database/like';
import { PageParams } from '../page/page';

/** 登录日志状态：0 成功，1 失败。 */
export type LoginStatus = '0' | '1';

export interface LoginLog {
  id: number;
  userName: string;
  ipaddr: string;
  loginLocation: string;
  browser: string;
  os: string;
  status: string;
  msg: string;
  loginTime: Date | null;
}

export type NewLoginLog = Omit<LoginLog, 'id' | 'loginTime'>;

export interface LoginLogQuery {
  userName?: string;
  ipaddr?: string;
  status?: string;
  beginTime?: Date | null;
  endTime?: Date | null;
}

/**
 * 登录日志存储：只追加，按 ID 或按时间清理。
 */
export abstract class LoginLogDao {
  abstract insert(log: NewLoginLog): Promise<void>;
  abstract page(query: LoginLogQuery, page: PageParams): Promise<{ rows: LoginLog[]; total: number }>;
  abstract deleteByIds(ids: number[]): Promise<number>;
  abstract deleteBefore(time: Date | null): Promise<number>;
  abstract count(): Promise<number>;
}

interface LoginLogRow {
  id: number;
  user_name: string | null;
  ipaddr: string | null;
  login_location: string | null;
  browser: string | null;
  os: string | null;
  status: string | null;
  msg: string | null;
  login_time: Date | null;
}

/**
 * sys_logininfor 与 app_login_log 结构一致，仅表名与主键不同。
 */
export abstract class PgLoginLogDao extends LoginLogDao {
  protected constructor(
    private readonly db: DatabaseService,
    private readonly table: string,
    private readonly pk: string,
  ) {
    super();
  }

  async insert(log: NewLoginLog): Promise<void> {
    await this.db.query(
      `INSERT INTO ${this.table} (user_name, ipaddr, login_location, browser, os, status, msg, login_time)
       VALUES ($1, $2, $3, $4, $5, $6, $7, NOW())`,
      [
        log.userName,
        log.ipaddr.slice(0, 128),
        log.loginLocation,
        log.browser.slice(0, 50),
        log.os.slice(0, 50),
        log.status,
        log.msg.slice(0, 255),
      ],
    );
  }

  async page(query: LoginLogQuery, page: PageParams): Promise<{ rows: LoginLog[]; total: number }> {
    let where = 'WHERE 1=1';
    const args: unknown[] = [];
    let argPos = 1;
    if (query.userName) {
      where += ` AND user_name ILIKE $${argPos++}${LIKE_ESCAPE}`;
      args.push(containsPattern(query.userName));
    }
    if (query.ipaddr) {
      where += ` AND ipaddr ILIKE $${argPos++}${LIKE_ESCAPE}`;
      args.push(containsPattern(query.ipaddr));
    }
    if (query.status) {
      where += ` AND status = $${argPos++}`;
      args.push(query.status);
    }
    if (query.beginTime) {
      where += ` AND login_time >= $${argPos++}`;
      args.push(query.beginTime);
    }
    if (query.endTime) {
      where += ` AND login_time <= $${argPos++}`;
      args.push(query.endTime);
    }
    const count = await this.db.query<{ total: string }>(
      `SELECT COUNT(*) AS total FROM ${this.table} ${where}`,
      args,
    );
    const total = Number(count.rows[0]?.total ?? 0);
    if (!total) return { rows: [], total: 0 };
    const { rows } = await this.db.query<LoginLogRow>(
      `SELECT ${this.pk} AS id, user_name, ipaddr, login_location, browser, os, status, msg, login_time
         FROM ${this.table} ${where}
        ORDER BY login_time DESC, ${this.pk} DESC
        LIMIT $${argPos} OFFSET $${argPos + 1}`,
      [...args, page.pageSize, page.offset],
    );
    return {
      rows: rows.map((r) => ({
        id: Number(r.id),
        userName: r.user_name ?? '',
        ipaddr: r.ipaddr ?? '',
        loginLocation: r.login_location ?? '',
        browser: r.browser ?? '',
        os: r.os ?? '',
        status: r.status ?? '0',
        msg: r.msg ?? '',
        loginTime: r.login_time,
      })),
      total,
    };
  }

  async deleteByIds(ids: number[]): Promise<number> {
    const result = await this.db.query(
      `DELETE FROM ${this.table} WHERE ${this.pk} = ANY($1::int[])`,
      [ids],
    );
    return result.rowCount ?? 0;
  }

  /** time 为 null 时清空全部。 */
  async deleteBefore(time: Date | null): Promise<number> {
    const result = time
      ? await this.db.query(`DELETE FROM ${this.table} WHERE login_time < $1`, [time])
      : await this.db.query(`DELETE FROM ${this.table}`);
    return result.rowCount ?? 0;
  }

  async count(): Promise<number> {
    const { rows } = await this.db.query<{ total: string }>(
      `SELECT COUNT(*) AS total FROM ${this.table}`,
    );
    return Number(rows[0]?.total ?? 0);
  }
}
