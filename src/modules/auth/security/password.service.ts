import { Injectable } from '@nestjs/common';
import * as bcrypt from 'bcryptjs';

/**
 * 密码哈希服务，使用 bcrypt，兼容历史数据中的 {bcrypt} 前缀。
 */
@Injectable()
export class PasswordService {
  async verify(rawPassword: string, encodedPassword: string): Promise<boolean> {
    if (!rawPassword || !encodedPassword) return false;
    let enc = encodedPassword;
    if (enc.startsWith('{bcrypt}')) {
      enc = enc.substring('{bcrypt}'.length);
    }
    try {
      return await bcrypt.compare(rawPassword, enc);
    } catch {
      return false;
    }
  }

  async hash(rawPassword: string): Promise<string> {
    if (!rawPassword) {
      throw new Error('密码不能为空');
    }
    return bcrypt.hash(rawPassword, 10);
  }
}

/** 至少 6 位且同时包含字母与数字。 */
export function isStrongPassword(password: string): boolean {
  return password.length >= 6 && /[A-Za-z]/.test(password) && /\d/.test(password);
}
