import { Injectable } from '@nestjs/common';
import { ServiceWarning } from '../../../shared/exception/exceptions';
import { buildPage, normalizePage, PageResult } from '../../../shared/page/page';
import { formatDateTime, parseDateTime, parseEndDateTime } from '../../../shared/time/time';
import { LoginUser } from '../../auth/login-user';
import { PasswordService } from '../../auth/security/password.service';
import { RoleResp } from '../role/dto';
import { SysRoleDao } from '../role/role.dao';
import { toRoleResp } from '../role/role.service';
import { UserDto, UserQueryDto, UserResp } from './dto';
import { SysUserDao } from './user.dao';
import { SUPER_ADMIN_ID, SysUser } from './user.entity';

const PASSWORD_RULE = /^(?=.*[A-Za-z])(?=.*\d).{8,32}$/;
const PASSWORD_RULE_MSG = '密码长度为 8-32 个字符，至少包含字母和数字';

export function toUserResp(u: SysUser): UserResp {
  return {
    userId: u.userId,
    deptId: u.deptId,
    userName: u.userName,
    nickName: u.nickName,
    email: u.email,
    phonenumber: u.phonenumber,
    sex: u.sex,
    avatar: u.avatar,
    status: u.status,
    loginIp: u.loginIp,
    loginDate: formatDateTime(u.loginDate),
    createBy: u.createBy,
    createTime: formatDateTime(u.createTime),
    remark: u.remark,
    admin: u.userId === SUPER_ADMIN_ID,
  };
}

/**
 * 系统用户业务：唯一性校验、超级管理员保护、角色分配。
 */
@Injectable()
export class UserService {
  constructor(
    private readonly userDao: SysUserDao,
    private readonly roleDao: SysRoleDao,
    private readonly passwordService: PasswordService,
  ) {}

  async page(query: UserQueryDto): Promise<PageResult<UserResp>> {
    const page = normalizePage(query.pageNum, query.pageSize);
    const { rows, total } = await this.userDao.page(
      {
        userName: query.userName?.trim(),
        phonenumber: query.phonenumber?.trim(),
        status: query.status,
        beginTime: parseDateTime(query.beginTime),
        endTime: parseEndDateTime(query.endTime),
      },
      page,
    );
    return buildPage(rows.map(toUserResp), total, page);
  }

  async detail(
    userId: number,
  ): Promise<{ user: UserResp; roleIds: number[]; roles: RoleResp[] }> {
    const user = await this.userDao.findById(userId);
    if (!user) throw new ServiceWarning('用户不存在');
    const roles = (await this.roleDao.listAll()).map(toRoleResp);
    return {
      user: toUserResp(user),
      roleIds: await this.userDao.roleIdsOf(userId),
      roles: userId === SUPER_ADMIN_ID ? roles : roles.filter((r) => !r.admin),
    };
  }

  async findById(userId: number): Promise<SysUser | null> {
    return this.userDao.findById(userId);
  }

  async findByUserName(userName: string): Promise<SysUser | null> {
    return this.userDao.findByUserName(userName);
  }

  async add(dto: UserDto, operator: LoginUser): Promise<number> {
    const userName = dto.userName.trim();
    const prefix = `新增用户'${userName}'失败`;
    if (await this.userDao.existsBy('user_name', userName)) {
      throw new ServiceWarning(`${prefix}，登录账号已存在`);
    }
    if (dto.phonenumber && (await this.userDao.existsBy('phonenumber', dto.phonenumber))) {
      throw new ServiceWarning(`${prefix}，手机号码已存在`);
    }
    if (dto.email && (await this.userDao.existsBy('email', dto.email))) {
      throw new ServiceWarning(`${prefix}，邮箱账号已存在`);
    }
    const password = dto.password ?? '';
    if (!PASSWORD_RULE.test(password)) {
      throw new ServiceWarning(PASSWORD_RULE_MSG);
    }
    return this.userDao.insert(
      {
        deptId: dto.deptId ?? null,
        userName,
        nickName: dto.nickName.trim(),
        email: dto.email ?? '',
        phonenumber: dto.phonenumber ?? '',
        sex: dto.sex ?? '0',
        password: await this.passwordService.hash(password),
        status: dto.status ?? '0',
        remark: dto.remark ?? '',
        createBy: operator.userName,
      },
      dto.roleIds ?? [],
    );
  }

  async edit(dto: UserDto, operator: LoginUser): Promise<void> {
    const userId = dto.userId ?? 0;
    this.assertNotSuperAdmin(userId);
    const existing = await this.userDao.findById(userId);
    if (!existing) throw new ServiceWarning('用户不存在');
    const prefix = `修改用户'${existing.userName}'失败`;
    if (dto.phonenumber && (await this.userDao.existsBy('phonenumber', dto.phonenumber, userId))) {
      throw new ServiceWarning(`${prefix}，手机号码已存在`);
    }
    if (dto.email && (await this.userDao.existsBy('email', dto.email, userId))) {
      throw new ServiceWarning(`${prefix}，邮箱账号已存在`);
    }
    if (dto.status === '1' && userId === operator.userId) {
      throw new ServiceWarning('不允许禁用当前用户');
    }
    await this.userDao.update(
      userId,
      {
        deptId: dto.deptId,
        nickName: dto.nickName.trim(),
        email: dto.email,
        phonenumber: dto.phonenumber,
        sex: dto.sex,
        status: dto.status,
        remark: dto.remark,
        updateBy: operator.userName,
      },
      dto.roleIds,
    );
  }

  async remove(userIds: number[], operator: LoginUser): Promise<number> {
    if (!userIds.length) throw new ServiceWarning('请选择要删除的用户');
    if (userIds.includes(operator.userId)) {
      throw new ServiceWarning('当前用户不能删除');
    }
    userIds.forEach((id) => this.assertNotSuperAdmin(id));
    return this.userDao.softDelete(userIds, operator.userName);
  }

  async resetPassword(userId: number, password: string, operator: LoginUser): Promise<void> {
    this.assertNotSuperAdmin(userId);
    if (!PASSWORD_RULE.test(password)) {
      throw new ServiceWarning(PASSWORD_RULE_MSG);
    }
    if (!(await this.userDao.findById(userId))) throw new ServiceWarning('用户不存在');
    await this.userDao.updatePassword(
      userId,
      await this.passwordService.hash(password),
      operator.userName,
    );
  }

  async changeStatus(userId: number, status: string, operator: LoginUser): Promise<void> {
    this.assertNotSuperAdmin(userId);
    if (status === '1' && userId === operator.userId) {
      throw new ServiceWarning('不允许禁用当前用户');
    }
    await this.userDao.updateStatus(userId, status, operator.userName);
  }

  async recordLogin(userId: number, ip: string): Promise<void> {
    await this.userDao.updateLoginInfo(userId, ip, new Date());
  }

  private assertNotSuperAdmin(userId: number): void {
    if (userId === SUPER_ADMIN_ID) {
      throw new ServiceWarning('不允许操作超级管理员用户');
    }
  }
}
