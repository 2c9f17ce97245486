import { Injectable } from '@nestjs/common';
import { ServiceWarning } from '../../shared/exception/exceptions';
import { PageResult, buildPage, normalizePage } from '../../shared/page/page';
import { formatDateTime, parseDateTime, parseEndDateTime } from '../../shared/time/time';
import { PasswordService } from '../auth/security/password.service';
import { AppLoginLogDao } from './app-login-log.dao';
import { AppUserDao } from './app-user.dao';
import { AppUser, AppUserPatch, AppUserProfile, PROFILE_FIELDS } from './app-user.entity';
import {
  AppStatsResp,
  AppUserCreateDto,
  AppUserDetailResp,
  AppUserPublicResp,
  AppUserQueryDto,
  AppUserResp,
  AppUserUpdateDto,
  ChangePasswordDto,
  ProfileFieldsDto,
} from './dto';

export const SEARCH_DEFAULT_SIZE = 20;
const SEARCH_MAX_SIZE = 100;

export function toAppUserResp(u: AppUser): AppUserResp {
  return {
    userId: u.userId,
    userName: u.userName,
    nickName: u.nickName,
    email: u.email,
    phone: u.phone,
    sex: u.sex,
    avatar: u.avatar,
    status: u.status,
    loginIp: u.loginIp,
    loginDate: formatDateTime(u.loginDate),
    createTime: formatDateTime(u.createTime),
    updateTime: formatDateTime(u.updateTime),
    remark: u.remark,
  };
}

/** 只取请求中给出的资料字段。 */
export function pickProfile(dto: ProfileFieldsDto): Partial<AppUserProfile> {
  const profile: Partial<AppUserProfile> = {};
  for (const field of PROFILE_FIELDS) {
    const value = dto[field];
    if (value !== undefined) profile[field] = value.trim() === '' ? null : value.trim();
  }
  return profile;
}

/**
 * App 用户业务：后台管理与本人资料维护共用。
 * 用户名、手机号、邮箱的唯一性通过预查询校验。
 */
@Injectable()
export class AppUserService {
  constructor(
    private readonly userDao: AppUserDao,
    private readonly loginLogDao: AppLoginLogDao,
    private readonly passwordService: PasswordService,
  ) {}

  async page(query: AppUserQueryDto): Promise<PageResult<AppUserResp>> {
    const page = normalizePage(query.pageNum, query.pageSize);
    const { rows, total } = await this.userDao.page(
      {
        userName: query.userName?.trim(),
        nickName: query.nickName?.trim(),
        email: query.email?.trim(),
        phone: query.phone?.trim(),
        sex: query.sex,
        status: query.status,
        beginTime: parseDateTime(query.beginTime),
        endTime: parseEndDateTime(query.endTime),
      },
      page,
    );
    return buildPage(rows.map(toAppUserResp), total, page);
  }

  async detail(userId: number): Promise<AppUserDetailResp> {
    const user = await this.mustGet(userId);
    return { ...toAppUserResp(user), profile: await this.userDao.findProfile(userId) };
  }

  async findById(userId: number): Promise<AppUser | null> {
    return this.userDao.findById(userId);
  }

  async findByAccount(account: string): Promise<AppUser | null> {
    return this.userDao.findByAccount(account);
  }

  /**
   * 新增用户：依次校验用户名、手机号、邮箱；给出任一资料字段时同时创建资料。
   */
  async create(dto: AppUserCreateDto, operator: string): Promise<number> {
    const userName = dto.userName.trim();
    const phone = dto.phone?.trim() ?? '';
    const email = dto.email?.trim() ?? '';
    if (await this.userDao.existsBy('user_name', userName)) {
      throw new ServiceWarning('用户名已存在');
    }
    if (phone && (await this.userDao.existsBy('phone', phone))) {
      throw new ServiceWarning('手机号已存在');
    }
    if (email && (await this.userDao.existsBy('email', email))) {
      throw new ServiceWarning('邮箱已存在');
    }
    const profile = pickProfile(dto);
    return this.userDao.insert(
      {
        userName,
        nickName: dto.nickName.trim(),
        email,
        phone,
        sex: dto.sex ?? '0',
        password: await this.passwordService.hash(dto.password),
        status: dto.status ?? '0',
        createBy: operator,
        remark: dto.remark,
      },
      Object.keys(profile).length ? profile : null,
    );
  }

  async update(userId: number, dto: AppUserUpdateDto, operator: string): Promise<void> {
    await this.mustGet(userId);
    const phone = dto.phone?.trim();
    const email = dto.email?.trim();
    if (phone && (await this.userDao.existsBy('phone', phone, userId))) {
      throw new ServiceWarning('手机号已被其他用户使用');
    }
    if (email && (await this.userDao.existsBy('email', email, userId))) {
      throw new ServiceWarning('邮箱已被其他用户使用');
    }
    const patch: AppUserPatch = {
      nickName: dto.nickName?.trim(),
      email,
      phone,
      sex: dto.sex,
      avatar: dto.avatar,
      status: dto.status,
      remark: dto.remark,
      updateBy: operator,
    };
    await this.userDao.update(userId, patch);
    await this.userDao.upsertProfile(userId, pickProfile(dto));
  }

  async remove(ids: number[]): Promise<number> {
    if (!ids.length) throw new ServiceWarning('请选择要删除的用户');
    return this.userDao.deleteByIds(ids);
  }

  /** 返回提示文案。 */
  async changeStatus(userId: number, status: string, operator: string): Promise<string> {
    await this.mustGet(userId);
    await this.userDao.update(userId, { status, updateBy: operator });
    return status === '0' ? '用户启用成功' : '用户停用成功';
  }

  async resetPassword(userId: number, password: string, operator: string): Promise<void> {
    await this.mustGet(userId);
    await this.userDao.updatePassword(userId, await this.passwordService.hash(password), operator);
  }

  async changePassword(userId: number, dto: ChangePasswordDto): Promise<void> {
    if (dto.newPassword !== dto.confirmPassword) {
      throw new ServiceWarning('两次输入的新密码不一致');
    }
    if (dto.newPassword === dto.oldPassword) {
      throw new ServiceWarning('新密码不能与原密码相同');
    }
    const user = await this.mustGet(userId);
    if (!(await this.passwordService.verify(dto.oldPassword, user.password))) {
      throw new ServiceWarning('原密码错误');
    }
    await this.userDao.updatePassword(
      userId,
      await this.passwordService.hash(dto.newPassword),
      user.userName,
    );
  }

  async recordLogin(userId: number, ip: string): Promise<void> {
    await this.userDao.updateLoginInfo(userId, ip, new Date());
  }

  /** 搜索正常状态用户；pageSize 超出 1-100 时回到默认 20。 */
  async search(
    keyword: string | undefined,
    pageNum?: number,
    pageSize?: number,
  ): Promise<PageResult<AppUserPublicResp>> {
    const size =
      pageSize !== undefined && pageSize >= 1 && pageSize <= SEARCH_MAX_SIZE
        ? pageSize
        : SEARCH_DEFAULT_SIZE;
    const page = normalizePage(pageNum, size, { defaultSize: SEARCH_DEFAULT_SIZE });
    const kw = (keyword ?? '').trim();
    if (!kw) return buildPage([], 0, page);
    const { rows, total } = await this.userDao.search(kw, page);
    return buildPage(rows.map(toPublic), total, page);
  }

  async publicProfile(userId: number): Promise<AppUserPublicResp> {
    return toPublic(await this.mustGet(userId));
  }

  async stats(): Promise<AppStatsResp> {
    const todayStart = new Date();
    todayStart.setHours(0, 0, 0, 0);
    const users = await this.userDao.stats(todayStart);
    return { ...users, totalLoginLogs: await this.loginLogDao.count() };
  }

  private async mustGet(userId: number): Promise<AppUser> {
    const user = await this.userDao.findById(userId);
    if (!user) throw new ServiceWarning('用户不存在');
    return user;
  }
}

function toPublic(u: AppUser): AppUserPublicResp {
  return {
    userId: u.userId,
    userName: u.userName,
    nickName: u.nickName,
    avatar: u.avatar,
    sex: u.sex,
  };
}
