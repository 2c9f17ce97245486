import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { ApiResponse, ResponseCode, fail } from '../api-response/api-response';
import {
  AuthException,
  FieldValidationException,
  LoginException,
  ModelValidatorException,
  PermissionException,
  ServiceException,
  ServiceWarning,
} from './exceptions';

interface Mapped {
  status: number;
  body: ApiResponse<null>;
}

/**
 * 将异常映射为 HTTP 状态码与响应信封。
 * 业务异常一律返回 HTTP 200，由信封中的 code 区分。
 */
export function mapException(exception: unknown): Mapped {
  if (exception instanceof AuthException) {
    return {
      status: HttpStatus.OK,
      body: fail(ResponseCode.UNAUTHORIZED, exception.message),
    };
  }
  if (exception instanceof PermissionException) {
    return {
      status: HttpStatus.OK,
      body: fail(ResponseCode.FORBIDDEN, exception.message),
    };
  }
  if (
    exception instanceof LoginException ||
    exception instanceof ModelValidatorException ||
    exception instanceof FieldValidationException ||
    exception instanceof ServiceWarning
  ) {
    return {
      status: HttpStatus.OK,
      body: fail(ResponseCode.WARN, exception.message),
    };
  }
  if (exception instanceof ServiceException) {
    return {
      status: HttpStatus.OK,
      body: fail(ResponseCode.ERROR, exception.message),
    };
  }
  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    return { status, body: fail(status, httpExceptionMessage(exception)) };
  }
  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    body: fail(ResponseCode.ERROR, '服务器内部错误'),
  };
}

/** ValidationPipe 的 message 可能是字符串数组，这里合并为一条。 */
function httpExceptionMessage(exception: HttpException): string {
  const resp = exception.getResponse();
  if (typeof resp === 'string') return resp;
  if (typeof resp === 'object' && resp !== null && 'message' in resp) {
    const message: unknown = resp.message;
    if (Array.isArray(message)) return message.map(String).join('; ');
    if (typeof message === 'string') return message;
  }
  return exception.message;
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const { status, body } = mapException(exception);
    if (status >= 500) {
      const stack = exception instanceof Error ? exception.stack : undefined;
      this.logger.error(`请求处理异常: ${String(exception)}`, stack);
    } else if (body.code === ResponseCode.ERROR) {
      this.logger.warn(`服务异常: ${body.msg}`);
    }
    res.status(status).json(body);
  }
}
