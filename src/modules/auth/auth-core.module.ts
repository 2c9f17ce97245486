import { Global, Module } from '@nestjs/common';
import { AppTokenService, TokenService } from './jwt/jwt.service';
import { PasswordService } from './security/password.service';
import { SessionService } from './session/session.service';

/**
 * token、会话与密码工具，供各业务模块共用。
 */
@Global()
@Module({
  providers: [TokenService, AppTokenService, SessionService, PasswordService],
  exports: [TokenService, AppTokenService, SessionService, PasswordService],
})
export class AuthCoreModule {}
