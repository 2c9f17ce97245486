import { SetMetadata } from '@nestjs/common';

/** 操作日志业务类型，与 sys_oper_log.business_type 对应。 */
export enum BusinessType {
  OTHER = 0,
  INSERT = 1,
  UPDATE = 2,
  DELETE = 3,
  GRANT = 4,
  EXPORT = 5,
  IMPORT = 6,
  FORCE = 7,
  CLEAN = 9,
}

export interface LogOptions {
  title: string;
  businessType: BusinessType;
  /** 是否保存请求参数，默认 true。 */
  saveRequest?: boolean;
  /** 是否保存响应数据，默认 true。 */
  saveResponse?: boolean;
}

export const LOG_METADATA_KEY = 'monitor:operlog';

/**
 * 记录操作日志：@Log('用户管理', BusinessType.INSERT)
 */
export const Log = (
  title: string,
  businessType: BusinessType = BusinessType.OTHER,
  options: Pick<LogOptions, 'saveRequest' | 'saveResponse'> = {},
) => SetMetadata(LOG_METADATA_KEY, { title, businessType, ...options } satisfies LogOptions);
