import { FakeRedis } from '../../../__tests__/support/fake-redis';
import { MemoryAppUserDao, MemoryLoginLogDao, MemorySysConfigDao, appUser } from '../../../__tests__/support/memory-daos';
import { RedisService } from '../../../shared/redis/redis.service';
import { SysConfigService } from '../../../shared/sys-config/sys-config.service';
import { AppTokenService } from '../../auth/jwt/jwt.service';
import { PasswordService } from '../../auth/security/password.service';
import { AppAuthService } from '../app-auth.service';
import { AppLoginLogService } from '../app-login-log.service';
import { AppUserService } from '../app-user.service';

describe('AppAuthService', () => {
  let fake: FakeRedis;
  let users: MemoryAppUserDao;
  let tokens: AppTokenService;
  let service: AppAuthService;

  beforeEach(() => {
    fake = new FakeRedis();
    users = new MemoryAppUserDao();
    const redis = new RedisService(() => fake);
    const logs = new MemoryLoginLogDao();
    const passwords = new PasswordService();
    tokens = new AppTokenService();
    service = new AppAuthService(
      new AppUserService(users, logs, passwords),
      new AppLoginLogService(logs),
      passwords,
      tokens,
      new SysConfigService(new MemorySysConfigDao({ 'sys.account.registerUser': 'true' }), redis),
      redis,
    );
    users.users.push(appUser({ userId: 7, userName: 'zhangsan' }), appUser({ userId: 8, userName: 'lisi', status: '1' }));
  });

  it('refreshes a token for an enabled user', async () => {
    const resp = await service.refresh({ userId: 7, userName: 'zhangsan' });
    expect(resp.tokenType).toBe('bearer');
    expect(tokens.parse(`Bearer ${resp.accessToken}`)).toEqual({ sub: '7', user_name: 'zhangsan', type: 'app' });
  });

  it('refuses to refresh for disabled or missing users', async () => {
    await expect(service.refresh({ userId: 8, userName: 'lisi' })).rejects.toThrow('用户已被停用');
    await expect(service.refresh({ userId: 9, userName: 'ghost' })).rejects.toThrow('用户不存在');
  });

  it('validates the phone number before sending a code', async () => {
    await expect(service.sendSmsCode('12345')).rejects.toThrow('手机号格式不正确');
    expect(fake.strings.size).toBe(0);
  });

  it('still returns the code when Redis is down', async () => {
    fake.down = true;
    expect(await service.sendSmsCode(' 13900000000 ')).toEqual({ code: '123456' });
  });
});
