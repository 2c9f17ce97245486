import { Injectable, Logger } from '@nestjs/common';
import { Request } from 'express';
import { ServiceWarning } from '../../../shared/exception/exceptions';
import { LoginStatus } from '../../../shared/login-log/login-log.dao';
import {
  LoginLogQueryDto,
  LoginLogResp,
  toLoginLogQuery,
  toLoginLogResp,
} from '../../../shared/login-log/login-log';
import { PageResult, buildPage, normalizePage } from '../../../shared/page/page';
import { clientInfo } from '../../../shared/request/client-info';
import { SysLoginLogDao } from './logininfor.dao';

@Injectable()
export class LogininforService {
  private readonly logger = new Logger(LogininforService.name);

  constructor(private readonly loginLogDao: SysLoginLogDao) {}

  /**
   * 记录一次管理端登录结果，写库失败不影响登录流程。
   */
  async record(req: Request, userName: string, status: LoginStatus, msg: string): Promise<void> {
    const info = clientInfo(req);
    try {
      await this.loginLogDao.insert({
        userName,
        ipaddr: info.ip,
        loginLocation: info.location,
        browser: info.browser,
        os: info.os,
        status,
        msg,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`登录日志写入失败: ${message}`);
    }
  }

  async page(query: LoginLogQueryDto): Promise<PageResult<LoginLogResp>> {
    const page = normalizePage(query.pageNum, query.pageSize);
    const { rows, total } = await this.loginLogDao.page(toLoginLogQuery(query), page);
    return buildPage(rows.map(toLoginLogResp), total, page);
  }

  async remove(ids: number[]): Promise<number> {
    if (!ids.length) throw new ServiceWarning('请选择要删除的日志');
    return this.loginLogDao.deleteByIds(ids);
  }

  clean(): Promise<number> {
    return this.loginLogDao.deleteBefore(null);
  }
}
