import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';

export interface SysConfigRow {
  config_key: string;
  config_value: string;
}

/**
 * 系统参数配置数据访问，基于 sys_config 表。
 */
export abstract class SysConfigDao {
  abstract listAll(): Promise<SysConfigRow[]>;
  abstract findValue(key: string): Promise<string | null>;
}

@Injectable()
export class PgSysConfigDao extends SysConfigDao {
  constructor(private readonly db: DatabaseService) {
    super();
  }

  async listAll(): Promise<SysConfigRow[]> {
    const { rows } = await this.db.query<SysConfigRow>(
      `SELECT config_key, COALESCE(config_value, '') AS config_value FROM sys_config ORDER BY config_id`,
    );
    return rows;
  }

  async findValue(key: string): Promise<string | null> {
    const { rows } = await this.db.query<{ config_value: string | null }>(
      `SELECT config_value FROM sys_config WHERE config_key = $1 LIMIT 1`,
      [key],
    );
    return rows.length ? rows[0].config_value ?? '' : null;
  }
}
