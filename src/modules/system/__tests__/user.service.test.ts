import { SystemDaos, createSystemDaos, sysUser } from '../../../__tests__/support/memory-daos';
import { LoginUser } from '../../auth/login-user';
import { PasswordService } from '../../auth/security/password.service';
import { UserDto } from '../user/dto';
import { UserService } from '../user/user.service';

const admin: LoginUser = { userId: 1, userName: 'admin', deptName: '', sessionId: 's1' };
const operator: LoginUser = { userId: 2, userName: 'operator', deptName: '', sessionId: 's2' };

function userDto(fields: Partial<UserDto>): UserDto {
  return Object.assign(new UserDto(), { userName: 'alice', nickName: '爱丽丝', ...fields });
}

describe('UserService', () => {
  let daos: SystemDaos;
  let passwords: PasswordService;
  let service: UserService;

  beforeEach(() => {
    daos = createSystemDaos();
    passwords = new PasswordService();
    service = new UserService(daos.users, daos.roles, passwords);
  });

  describe('add', () => {
    it('rejects a taken user name', async () => {
      await expect(service.add(userDto({ userName: 'operator', password: 'abc12345' }), admin)).rejects.toThrow(
        "新增用户'operator'失败，登录账号已存在",
      );
    });

    it('rejects a taken phone number', async () => {
      daos.users.users[1].phonenumber = '13800000000';
      await expect(
        service.add(userDto({ phonenumber: '13800000000', password: 'abc12345' }), admin),
      ).rejects.toThrow("新增用户'alice'失败，手机号码已存在");
    });

    it('rejects a taken email', async () => {
      daos.users.users[1].email = 'op@example.com';
      await expect(
        service.add(userDto({ email: 'op@example.com', password: 'abc12345' }), admin),
      ).rejects.toThrow("新增用户'alice'失败，邮箱账号已存在");
    });

    it('rejects a weak password', async () => {
      await expect(service.add(userDto({ password: '12345678' }), admin)).rejects.toThrow(
        '密码长度为 8-32 个字符，至少包含字母和数字',
      );
    });

    it('stores a hashed password and the roles', async () => {
      const userId = await service.add(userDto({ password: 'abc12345', roleIds: [2] }), admin);
      const saved = await daos.users.findById(userId);
      expect(saved?.createBy).toBe('admin');
      expect(saved?.password).not.toBe('abc12345');
      expect(await passwords.verify('abc12345', saved?.password ?? '')).toBe(true);
      expect(await daos.users.roleIdsOf(userId)).toEqual([2]);
    });
  });

  describe('edit', () => {
    it('protects the super admin', async () => {
      await expect(service.edit(userDto({ userId: 1, userName: 'admin' }), admin)).rejects.toThrow(
        '不允许操作超级管理员用户',
      );
    });

    it('allows keeping its own phone number', async () => {
      daos.users.users[1].phonenumber = '13800000000';
      await service.edit(userDto({ userId: 2, userName: 'operator', phonenumber: '13800000000', nickName: '新昵称' }), admin);
      expect((await daos.users.findById(2))?.nickName).toBe('新昵称');
    });

    it("rejects another user's phone number", async () => {
      daos.users.users.push(sysUser({ userId: 3, userName: 'bob', phonenumber: '13900000000' }));
      await expect(
        service.edit(userDto({ userId: 2, userName: 'operator', phonenumber: '13900000000' }), admin),
      ).rejects.toThrow("修改用户'operator'失败，手机号码已存在");
    });

    it('does not let users disable themselves', async () => {
      await expect(
        service.edit(userDto({ userId: 2, userName: 'operator', status: '1' }), operator),
      ).rejects.toThrow('不允许禁用当前用户');
    });
  });

  describe('remove', () => {
    it('requires a selection', async () => {
      await expect(service.remove([], admin)).rejects.toThrow('请选择要删除的用户');
    });

    it('refuses to delete the current user', async () => {
      await expect(service.remove([2], operator)).rejects.toThrow('当前用户不能删除');
    });

    it('soft deletes the others', async () => {
      expect(await service.remove([2], admin)).toBe(1);
      expect(await daos.users.findById(2)).toBeNull();
    });
  });

  it('hides the admin role from ordinary users in the detail view', async () => {
    const detail = await service.detail(2);
    expect(detail.user.userName).toBe('operator');
    expect(detail.roleIds).toEqual([2]);
    expect(detail.roles.map((r) => r.roleKey)).toEqual(['common']);
  });

  it('pages with filters', async () => {
    const page = await service.page({ userName: 'oper', pageNum: 1, pageSize: 10 });
    expect(page.total).toBe(1);
    expect(page.rows[0]).toMatchObject({ userId: 2, userName: 'operator', admin: false, createTime: '2024-01-01 08:00:00' });
  });

  it('resets a password after checking its strength', async () => {
    await expect(service.resetPassword(2, 'short', admin)).rejects.toThrow('密码长度为 8-32 个字符，至少包含字母和数字');
    await service.resetPassword(2, 'newpass123', admin);
    const saved = await daos.users.findById(2);
    expect(await passwords.verify('newpass123', saved?.password ?? '')).toBe(true);
  });

  it('refuses to disable the super admin', async () => {
    await expect(service.changeStatus(1, '1', operator)).rejects.toThrow('不允许操作超级管理员用户');
  });
});
