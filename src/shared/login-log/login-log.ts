import { Type } from 'class-transformer';
import { IsIn, IsOptional, IsString } from 'class-validator';
import { formatDateTime, parseDateTime, parseEndDateTime } from '../time/time';
import { LoginLog, LoginLogQuery } from './login-log.dao';

export class LoginLogQueryDto {
  @IsOptional()
  @Type(() => Number)
  pageNum?: number;

  @IsOptional()
  @Type(() => Number)
  pageSize?: number;

  @IsOptional()
  @IsString()
  userName?: string;

  @IsOptional()
  @IsString()
  ipaddr?: string;

  @IsOptional()
  @IsIn(['0', '1'])
  status?: string;

  @IsOptional()
  @IsString()
  beginTime?: string;

  @IsOptional()
  @IsString()
  endTime?: string;
}

export interface LoginLogResp {
  infoId: number;
  userName: string;
  ipaddr: string;
  loginLocation: string;
  browser: string;
  os: string;
  status: string;
  msg: string;
  loginTime: string;
}

export function toLoginLogQuery(dto: LoginLogQueryDto): LoginLogQuery {
  return {
    userName: dto.userName?.trim(),
    ipaddr: dto.ipaddr?.trim(),
    status: dto.status,
    beginTime: parseDateTime(dto.beginTime),
    endTime: parseEndDateTime(dto.endTime),
  };
}

export function toLoginLogResp(log: LoginLog): LoginLogResp {
  return {
    infoId: log.id,
    userName: log.userName,
    ipaddr: log.ipaddr,
    loginLocation: log.loginLocation,
    browser: log.browser,
    os: log.os,
    status: log.status,
    msg: log.msg,
    loginTime: formatDateTime(log.loginTime),
  };
}
