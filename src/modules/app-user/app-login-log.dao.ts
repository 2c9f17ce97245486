import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../../shared/database/database.service';
import { LoginLogDao, PgLoginLogDao } from '../../shared/login-log/login-log.dao';

/** App 端登录日志（app_login_log）。 */
export abstract class AppLoginLogDao extends LoginLogDao {}

@Injectable()
export class PgAppLoginLogDao extends PgLoginLogDao {
  constructor(db: DatabaseService) {
    super(db, 'app_login_log', 'log_id');
  }
}
