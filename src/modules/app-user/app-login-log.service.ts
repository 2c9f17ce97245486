import { Injectable, Logger } from '@nestjs/common';
import { Request } from 'express';
import { ServiceWarning } from '../../shared/exception/exceptions';
import { LoginStatus } from '../../shared/login-log/login-log.dao';
import {
  LoginLogQueryDto,
  LoginLogResp,
  toLoginLogQuery,
  toLoginLogResp,
} from '../../shared/login-log/login-log';
import { PageResult, buildPage, normalizePage } from '../../shared/page/page';
import { clientInfo } from '../../shared/request/client-info';
import { AppLoginLogDao } from './app-login-log.dao';

export const DEFAULT_CLEAN_DAYS = 30;

@Injectable()
export class AppLoginLogService {
  private readonly logger = new Logger(AppLoginLogService.name);

  constructor(private readonly loginLogDao: AppLoginLogDao) {}

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
      this.logger.warn(`App登录日志写入失败: ${message}`);
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

  /** 删除 days 天之前的日志，返回删除条数。 */
  async clean(days: number = DEFAULT_CLEAN_DAYS, now: Date = new Date()): Promise<number> {
    if (!Number.isInteger(days) || days < 1) {
      throw new ServiceWarning('清理天数不能小于1');
    }
    const before = new Date(now.getTime() - days * 24 * 3600 * 1000);
    return this.loginLogDao.deleteBefore(before);
  }
}
