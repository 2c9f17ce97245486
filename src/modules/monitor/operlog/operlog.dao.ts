import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../../../shared/database/database.service';
import { LIKE_ESCAPE, containsPattern } from '../../../shared/database/like';
import { PageParams } from '../../../shared/page/page';

export interface SysOperLog {
  operId: number;
  title: string;
  businessType: number;
  method: string;
  requestMethod: string;
  operName: string;
  operUrl: string;
  operIp: string;
  operParam: string;
  jsonResult: string;
  status: number;
  errorMsg: string;
  operTime: Date | null;
  costTime: number;
}

export type NewOperLog = Omit<SysOperLog, 'operId' | 'operTime'>;

export interface OperLogQuery {
  title?: string;
  operName?: string;
  businessType?: number;
  status?: number;
  beginTime?: Date | null;
  endTime?: Date | null;
}

export abstract class OperLogDao {
  abstract insert(log: NewOperLog): Promise<void>;
  abstract page(query: OperLogQuery, page: PageParams): Promise<{ rows: SysOperLog[]; total: number }>;
  abstract findById(operId: number): Promise<SysOperLog | null>;
  abstract deleteByIds(ids: number[]): Promise<number>;
  abstract clean(): Promise<number>;
}

interface OperLogRow {
  oper_id: number;
  title: string | null;
  business_type: number | null;
  method: string | null;
  request_method: string | null;
  oper_name: string | null;
  oper_url: string | null;
  oper_ip: string | null;
  oper_param: string | null;
  json_result: string | null;
  status: number | null;
  error_msg: string | null;
  oper_time: Date | null;
  cost_time: string | number | null;
}

const COLUMNS = `oper_id, title, business_type, method, request_method, oper_name, oper_url,
  oper_ip, oper_param, json_result, status, error_msg, oper_time, cost_time`;

function toOperLog(r: OperLogRow): SysOperLog {
  return {
    operId: Number(r.oper_id),
    title: r.title ?? '',
    businessType: Number(r.business_type ?? 0),
    method: r.method ?? '',
    requestMethod: r.request_method ?? '',
    operName: r.oper_name ?? '',
    operUrl: r.oper_url ?? '',
    operIp: r.oper_ip ?? '',
    operParam: r.oper_param ?? '',
    jsonResult: r.json_result ?? '',
    status: Number(r.status ?? 0),
    errorMsg: r.error_msg ?? '',
    operTime: r.oper_time,
    costTime: Number(r.cost_time ?? 0),
  };
}

@Injectable()
export class PgOperLogDao extends OperLogDao {
  constructor(private readonly db: DatabaseService) {
    super();
  }

  async insert(log: NewOperLog): Promise<void> {
    await this.db.query(
      `INSERT INTO sys_oper_log (title, business_type, method, request_method, oper_name, oper_url,
         oper_ip, oper_param, json_result, status, error_msg, oper_time, cost_time)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, NOW(), $12)`,
      [
        log.title,
        log.businessType,
        log.method.slice(0, 100),
        log.requestMethod,
        log.operName,
        log.operUrl.slice(0, 255),
        log.operIp.slice(0, 128),
        log.operParam.slice(0, 2000),
        log.jsonResult.slice(0, 2000),
        log.status,
        log.errorMsg.slice(0, 2000),
        log.costTime,
      ],
    );
  }

  async page(query: OperLogQuery, page: PageParams): Promise<{ rows: SysOperLog[]; total: number }> {
    let where = 'WHERE 1=1';
    const args: unknown[] = [];
    let argPos = 1;
    if (query.title) {
      where += ` AND title ILIKE $${argPos++}${LIKE_ESCAPE}`;
      args.push(containsPattern(query.title));
    }
    if (query.operName) {
      where += ` AND oper_name ILIKE $${argPos++}${LIKE_ESCAPE}`;
      args.push(containsPattern(query.operName));
    }
    if (query.businessType !== undefined) {
      where += ` AND business_type = $${argPos++}`;
      args.push(query.businessType);
    }
    if (query.status !== undefined) {
      where += ` AND status = $${argPos++}`;
      args.push(query.status);
    }
    if (query.beginTime) {
      where += ` AND oper_time >= $${argPos++}`;
      args.push(query.beginTime);
    }
    if (query.endTime) {
      where += ` AND oper_time <= $${argPos++}`;
      args.push(query.endTime);
    }
    const count = await this.db.query<{ total: string }>(
      `SELECT COUNT(*) AS total FROM sys_oper_log ${where}`,
      args,
    );
    const total = Number(count.rows[0]?.total ?? 0);
    if (!total) return { rows: [], total: 0 };
    const { rows } = await this.db.query<OperLogRow>(
      `SELECT ${COLUMNS} FROM sys_oper_log ${where}
        ORDER BY oper_time DESC, oper_id DESC
        LIMIT $${argPos} OFFSET $${argPos + 1}`,
      [...args, page.pageSize, page.offset],
    );
    return { rows: rows.map(toOperLog), total };
  }

  async findById(operId: number): Promise<SysOperLog | null> {
    const { rows } = await this.db.query<OperLogRow>(
      `SELECT ${COLUMNS} FROM sys_oper_log WHERE oper_id = $1`,
      [operId],
    );
    return rows[0] ? toOperLog(rows[0]) : null;
  }

  async deleteByIds(ids: number[]): Promise<number> {
    const result = await this.db.query(
      'DELETE FROM sys_oper_log WHERE oper_id = ANY($1::int[])',
      [ids],
    );
    return result.rowCount ?? 0;
  }

  async clean(): Promise<number> {
    const result = await this.db.query('DELETE FROM sys_oper_log');
    return result.rowCount ?? 0;
  }
}
