/**
 * 业务异常定义，由全局异常过滤器统一映射为响应信封。
 */
export class ServiceException extends Error {
  constructor(message = '服务异常') {
    super(message);
    this.name = 'ServiceException';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** 业务告警，映射为 601 软失败。 */
export class ServiceWarning extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ServiceWarning';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** 未登录或登录已失效。 */
export class AuthException extends Error {
  constructor(message = '用户未登录或登录已过期') {
    super(message);
    this.name = 'AuthException';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PermissionException extends Error {
  constructor(message = '没有访问权限，请联系管理员授权') {
    super(message);
    this.name = 'PermissionException';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class LoginException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LoginException';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ModelValidatorException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModelValidatorException';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class FieldValidationException extends Error {
  constructor(
    readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'FieldValidationException';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
