/**
 * 统一 API 响应结构 {code, msg, data}，附带 success 与 timestamp 便于前端判断。
 */
export interface ApiResponse<T> {
  code: number;
  msg: string;
  data: T;
  success: boolean;
  timestamp: string;
}

/** 业务响应码，与 RuoYi 前端约定一致。 */
export enum ResponseCode {
  SUCCESS = 200,
  UNAUTHORIZED = 401,
  FORBIDDEN = 403,
  ERROR = 500,
  WARN = 601,
}

function nowString(): string {
  return Date.now().toString();
}

/**
 * 成功响应包装。
 */
export function ok<T>(data: T, msg = '操作成功'): ApiResponse<T> {
  return {
    code: ResponseCode.SUCCESS,
    msg,
    data,
    success: true,
    timestamp: nowString(),
  };
}

/**
 * 失败响应包装。
 */
export function fail(code: number, msg: string): ApiResponse<null> {
  return {
    code,
    msg,
    data: null,
    success: false,
    timestamp: nowString(),
  };
}

/** 业务告警（软失败），前端以提示框展示。 */
export function warn(msg: string): ApiResponse<null> {
  return fail(ResponseCode.WARN, msg);
}
