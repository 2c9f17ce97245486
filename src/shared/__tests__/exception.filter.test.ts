import { BadRequestException, NotFoundException } from '@nestjs/common';
import { mapException } from '../exception/exception.filter';
import {
  AuthException,
  LoginException,
  PermissionException,
  ServiceException,
  ServiceWarning,
} from '../exception/exceptions';

describe('mapException', () => {
  it('maps auth failures to envelope code 401 with HTTP 200', () => {
    const { status, body } = mapException(new AuthException());
    expect(status).toBe(200);
    expect(body.code).toBe(401);
    expect(body.msg).toBe('用户未登录或登录已过期');
    expect(body.data).toBeNull();
  });

  it('maps permission failures to 403', () => {
    const { status, body } = mapException(new PermissionException());
    expect(status).toBe(200);
    expect(body.code).toBe(403);
  });

  it('maps business warnings and login failures to 601', () => {
    expect(mapException(new ServiceWarning('用户名已存在')).body).toMatchObject({
      code: 601,
      msg: '用户名已存在',
      success: false,
    });
    expect(mapException(new LoginException('验证码错误')).body.code).toBe(601);
  });

  it('maps service errors to 500 inside a 200 response', () => {
    const { status, body } = mapException(new ServiceException('传入session_id为空'));
    expect(status).toBe(200);
    expect(body).toMatchObject({ code: 500, msg: '传入session_id为空' });
  });

  it('joins validation messages', () => {
    const { status, body } = mapException(new BadRequestException(['用户名不能为空', '密码不能为空']));
    expect(status).toBe(400);
    expect(body).toMatchObject({ code: 400, msg: '用户名不能为空; 密码不能为空' });
  });

  it('keeps the status of other HTTP exceptions', () => {
    const { status, body } = mapException(new NotFoundException('missing'));
    expect(status).toBe(404);
    expect(body.msg).toBe('missing');
  });

  it('hides unexpected errors behind a generic message', () => {
    const { status, body } = mapException(new Error('relation "sys_user" does not exist'));
    expect(status).toBe(500);
    expect(body).toMatchObject({ code: 500, msg: '服务器内部错误' });
  });
});
