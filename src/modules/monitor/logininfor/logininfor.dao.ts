import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../../../shared/database/database.service';
import { LoginLogDao, PgLoginLogDao } from '../../../shared/login-log/login-log.dao';

/** 管理端登录日志（sys_logininfor）。 */
export abstract class SysLoginLogDao extends LoginLogDao {}

@Injectable()
export class PgSysLoginLogDao extends PgLoginLogDao {
  constructor(db: DatabaseService) {
    super(db, 'sys_logininfor', 'info_id');
  }
}
