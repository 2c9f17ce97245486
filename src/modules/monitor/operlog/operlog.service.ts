import { Injectable, Logger } from '@nestjs/common';
import { PageResult, buildPage, normalizePage } from '../../../shared/page/page';
import { formatDateTime, parseDateTime, parseEndDateTime } from '../../../shared/time/time';
import { ServiceWarning } from '../../../shared/exception/exceptions';
import { OperLogQueryDto, OperLogResp } from './dto';
import { NewOperLog, OperLogDao, SysOperLog } from './operlog.dao';

function toOperLogResp(log: SysOperLog): OperLogResp {
  return { ...log, operTime: formatDateTime(log.operTime) };
}

@Injectable()
export class OperLogService {
  private readonly logger = new Logger(OperLogService.name);

  constructor(private readonly operLogDao: OperLogDao) {}

  /**
   * 写入一条操作日志。写库失败只记录告警，不影响业务响应。
   */
  async record(log: NewOperLog): Promise<void> {
    try {
      await this.operLogDao.insert(log);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`操作日志写入失败: ${message}`);
    }
  }

  async page(query: OperLogQueryDto): Promise<PageResult<OperLogResp>> {
    const page = normalizePage(query.pageNum, query.pageSize);
    const { rows, total } = await this.operLogDao.page(
      {
        title: query.title?.trim(),
        operName: query.operName?.trim(),
        businessType: query.businessType,
        status: query.status,
        beginTime: parseDateTime(query.beginTime),
        endTime: parseEndDateTime(query.endTime),
      },
      page,
    );
    return buildPage(rows.map(toOperLogResp), total, page);
  }

  async get(operId: number): Promise<OperLogResp> {
    const log = await this.operLogDao.findById(operId);
    if (!log) throw new ServiceWarning('操作日志不存在');
    return toOperLogResp(log);
  }

  async remove(ids: number[]): Promise<number> {
    if (!ids.length) throw new ServiceWarning('请选择要删除的日志');
    return this.operLogDao.deleteByIds(ids);
  }

  clean(): Promise<number> {
    return this.operLogDao.clean();
  }
}
