import { Injectable } from '@nestjs/common';

type CaptchaRecord = {
  code: string;
  expireTime: number;
};

/**
 * 验证码内存存储，仅在 Redis 不可用时使用。
 * 只在单个进程内生效，重启后数据丢失。
 */
@Injectable()
export class MemoryCaptchaStore {
  private readonly store = new Map<string, CaptchaRecord>();

  set(uuid: string, code: string, ttlSeconds: number): void {
    if (!uuid || !code) return;
    this.prune();
    this.store.set(uuid, { code, expireTime: Date.now() + ttlSeconds * 1000 });
  }

  /** 读取并删除，过期视为不存在。 */
  take(uuid: string): string | null {
    if (!uuid) return null;
    const rec = this.store.get(uuid);
    if (!rec) return null;
    this.store.delete(uuid);
    if (rec.expireTime <= Date.now()) {
      return null;
    }
    return rec.code;
  }

  private prune(): void {
    const now = Date.now();
    for (const [uuid, rec] of this.store) {
      if (rec.expireTime <= now) this.store.delete(uuid);
    }
  }
}
