import {
  MemoryAppUserDao,
  MemoryLoginLogDao,
  appUser,
  hashPassword,
} from '../../../__tests__/support/memory-daos';
import { PasswordService } from '../../auth/security/password.service';
import { AppUserService, pickProfile } from '../app-user.service';
import { AppUserCreateDto, AppUserUpdateDto, ChangePasswordDto } from '../dto';

function createDto(fields: Partial<AppUserCreateDto>): AppUserCreateDto {
  return Object.assign(new AppUserCreateDto(), { userName: 'zhangsan', nickName: '张三', password: 'pass1234', ...fields });
}

function updateDto(fields: Partial<AppUserUpdateDto>): AppUserUpdateDto {
  return Object.assign(new AppUserUpdateDto(), fields);
}

function passwordDto(oldPassword: string, newPassword: string, confirmPassword = newPassword): ChangePasswordDto {
  return Object.assign(new ChangePasswordDto(), { oldPassword, newPassword, confirmPassword });
}

describe('pickProfile', () => {
  it('keeps only the given fields and turns blanks into null', () => {
    expect(pickProfile(updateDto({ realName: ' 张三 ', address: '  ' }))).toEqual({ realName: '张三', address: null });
  });
});

describe('AppUserService', () => {
  let dao: MemoryAppUserDao;
  let logs: MemoryLoginLogDao;
  let passwords: PasswordService;
  let service: AppUserService;

  beforeEach(() => {
    dao = new MemoryAppUserDao();
    logs = new MemoryLoginLogDao();
    passwords = new PasswordService();
    service = new AppUserService(dao, logs, passwords);
    dao.users.push(
      appUser({ userId: 50, userName: 'lisi', nickName: '李四', phone: '13800000001', email: 'lisi@example.com', password: hashPassword('lisi1234') }),
      appUser({ userId: 51, userName: 'wangwu', nickName: '王五', status: '1' }),
    );
  });

  describe('create', () => {
    it('checks user name, phone and email in turn', async () => {
      await expect(service.create(createDto({ userName: 'lisi' }), 'admin')).rejects.toThrow('用户名已存在');
      await expect(service.create(createDto({ phone: '13800000001' }), 'admin')).rejects.toThrow('手机号已存在');
      await expect(service.create(createDto({ email: 'lisi@example.com' }), 'admin')).rejects.toThrow('邮箱已存在');
    });

    it('creates the profile only when a profile field is given', async () => {
      const plain = await service.create(createDto({}), 'admin');
      expect(dao.profiles.has(plain)).toBe(false);

      const withProfile = await service.create(createDto({ userName: 'zhaoliu', realName: '赵六', occupation: '教师' }), 'admin');
      expect((await service.detail(withProfile)).profile).toMatchObject({
        realName: '赵六',
        occupation: '教师',
        address: null,
      });
    });

    it('hashes the password and applies defaults', async () => {
      const userId = await service.create(createDto({}), 'admin');
      const saved = await dao.findById(userId);
      expect(saved).toMatchObject({ sex: '0', status: '0', createBy: 'admin', email: '', phone: '' });
      expect(await passwords.verify('pass1234', saved?.password ?? '')).toBe(true);
    });
  });

  describe('update', () => {
    it('rejects contact details owned by someone else', async () => {
      const userId = await service.create(createDto({}), 'admin');
      await expect(service.update(userId, updateDto({ phone: '13800000001' }), 'admin')).rejects.toThrow(
        '手机号已被其他用户使用',
      );
      await expect(service.update(userId, updateDto({ email: 'lisi@example.com' }), 'admin')).rejects.toThrow(
        '邮箱已被其他用户使用',
      );
    });

    it('keeps unspecified fields and upserts the profile', async () => {
      await service.update(50, updateDto({ phone: '13800000001', nickName: '小李', education: '本科' }), 'admin');
      const detail = await service.detail(50);
      expect(detail).toMatchObject({ nickName: '小李', phone: '13800000001', email: 'lisi@example.com' });
      expect(detail.profile?.education).toBe('本科');
    });

    it('fails for unknown users', async () => {
      await expect(service.update(999, updateDto({}), 'admin')).rejects.toThrow('用户不存在');
    });
  });

  it('requires ids to delete', async () => {
    await expect(service.remove([])).rejects.toThrow('请选择要删除的用户');
    expect(await service.remove([50, 999])).toBe(1);
  });

  it('reports the status change', async () => {
    expect(await service.changeStatus(50, '1', 'admin')).toBe('用户停用成功');
    expect(await service.changeStatus(50, '0', 'admin')).toBe('用户启用成功');
  });

  describe('changePassword', () => {
    it('validates the new password before checking the old one', async () => {
      await expect(service.changePassword(50, passwordDto('lisi1234', 'new12345', 'other123'))).rejects.toThrow(
        '两次输入的新密码不一致',
      );
      await expect(service.changePassword(50, passwordDto('lisi1234', 'lisi1234'))).rejects.toThrow(
        '新密码不能与原密码相同',
      );
      await expect(service.changePassword(50, passwordDto('wrong123', 'new12345'))).rejects.toThrow('原密码错误');
    });

    it('stores the new hash', async () => {
      await service.changePassword(50, passwordDto('lisi1234', 'new12345'));
      const saved = await dao.findById(50);
      expect(await passwords.verify('new12345', saved?.password ?? '')).toBe(true);
      expect(saved?.updateBy).toBe('lisi');
    });
  });

  describe('search', () => {
    it('returns an empty page without a keyword', async () => {
      expect(await service.search('  ')).toEqual({ rows: [], total: 0, pageNum: 1, pageSize: 20, totalPages: 0 });
    });

    it('falls back to the default size when out of range', async () => {
      expect((await service.search('li', 1, 500)).pageSize).toBe(20);
      expect((await service.search('li', 1, 0)).pageSize).toBe(20);
      expect((await service.search('li', 1, 5)).pageSize).toBe(5);
    });

    it('matches enabled users and hides private fields', async () => {
      const page = await service.search('王');
      expect(page.total).toBe(0);
      expect((await service.search('李')).rows).toEqual([
        { userId: 50, userName: 'lisi', nickName: '李四', avatar: '', sex: '0' },
      ]);
    });
  });

  it('counts users and login logs', async () => {
    await logs.insert({
      userName: 'lisi',
      ipaddr: '127.0.0.1',
      loginLocation: '内网IP',
      browser: 'Chrome 120',
      os: 'Linux',
      status: '0',
      msg: '登录成功',
    });
    await service.create(createDto({}), 'admin');
    expect(await service.stats()).toEqual({ totalUsers: 3, activeUsers: 2, todayNewUsers: 1, totalLoginLogs: 1 });
  });
});
