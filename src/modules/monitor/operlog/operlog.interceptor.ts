import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { Observable, from, throwError } from 'rxjs';
import { catchError, mergeMap } from 'rxjs/operators';
import { realIp } from '../../../shared/request/client-info';
import { asRecord } from '../../../shared/util/record';
import { getLoginUser } from '../../auth/login-user';
import { LOG_METADATA_KEY, LogOptions } from './log.decorator';
import { OperLogService } from './operlog.service';

const MAX_TEXT = 2000;
const SENSITIVE_FIELDS = ['password', 'oldPassword', 'newPassword', 'confirmPassword'];

function toJson(value: unknown): string {
  if (value === undefined) return '';
  try {
    return (JSON.stringify(value) ?? '').slice(0, MAX_TEXT);
  } catch {
    return '[unserializable]';
  }
}

/** 合并路径参数、查询参数与请求体，并屏蔽密码类字段。 */
export function requestParams(req: Request): string {
  const merged: Record<string, unknown> = {
    ...(asRecord(req.params) ?? {}),
    ...(asRecord(req.query) ?? {}),
    ...(asRecord(req.body) ?? {}),
  };
  for (const field of SENSITIVE_FIELDS) {
    if (field in merged) merged[field] = '******';
  }
  return Object.keys(merged).length ? toJson(merged) : '';
}

/**
 * 为标注了 @Log 的接口写入 sys_oper_log。
 * 成功 status=0；抛出异常时 status=1 并记录异常信息，异常继续向外抛出。
 */
@Injectable()
export class OperLogInterceptor implements NestInterceptor {
  constructor(
    private readonly reflector: Reflector,
    private readonly operLogService: OperLogService,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const options = this.reflector.get<LogOptions | undefined>(
      LOG_METADATA_KEY,
      context.getHandler(),
    );
    if (!options || context.getType() !== 'http') {
      return next.handle();
    }
    const req = context.switchToHttp().getRequest<Request>();
    const method = `${context.getClass().name}.${context.getHandler().name}()`;
    const start = Date.now();

    const write = (result: unknown, error: unknown) =>
      this.operLogService.record({
        title: options.title,
        businessType: options.businessType,
        method,
        requestMethod: req.method,
        operName: getLoginUser(req)?.userName ?? '',
        operUrl: req.originalUrl || req.url,
        operIp: realIp(req),
        operParam: options.saveRequest === false ? '' : requestParams(req),
        jsonResult: options.saveResponse === false || error ? '' : toJson(result),
        status: error ? 1 : 0,
        errorMsg: error ? (error instanceof Error ? error.message : String(error)) : '',
        costTime: Date.now() - start,
      });

    return next.handle().pipe(
      mergeMap((result: unknown) => from(write(result, null).then(() => result))),
      catchError((err: unknown) =>
        from(write(undefined, err)).pipe(mergeMap(() => throwError(() => err))),
      ),
    );
  }
}
