import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { captchaExpireMinutes } from '../../shared/config/env';
import { LoginException } from '../../shared/exception/exceptions';
import { RedisKeys } from '../../shared/redis/redis-keys';
import { RedisService } from '../../shared/redis/redis.service';
import { SysConfigService } from '../../shared/sys-config/sys-config.service';
import { MemoryCaptchaStore } from './captcha.store';

export interface CaptchaResp {
  captchaEnabled: boolean;
  registerEnabled: boolean;
  img: string;
  uuid: string;
}

export interface MathExpression {
  expression: string;
  answer: string;
}

type RandomFn = () => number;

function randomInt(max: number, random: RandomFn): number {
  return Math.floor(random() * (max + 1));
}

/**
 * 生成 `a 运算符 b = ?`，减法保证结果非负。
 */
export function createExpression(random: RandomFn = Math.random): MathExpression {
  let a = randomInt(9, random);
  let b = randomInt(9, random);
  const op = randomInt(2, random);
  if (op === 0) {
    return { expression: `${a} + ${b} = ?`, answer: String(a + b) };
  }
  if (op === 1) {
    if (a < b) [a, b] = [b, a];
    return { expression: `${a} - ${b} = ?`, answer: String(a - b) };
  }
  return { expression: `${a} × ${b} = ?`, answer: String(a * b) };
}

/** 简单 SVG 图片，附带几条干扰线，转为 Base64 Data URL。 */
export function renderCaptchaSvg(text: string, random: RandomFn = Math.random): string {
  const lines = Array.from({ length: 4 }, () => {
    const x1 = randomInt(160, random);
    const y1 = randomInt(60, random);
    const x2 = randomInt(160, random);
    const y2 = randomInt(60, random);
    return `<line x1="${x1}" y1="${y1}" x2="${x2}" y2="${y2}" stroke="#bbb" stroke-width="1"/>`;
  }).join('');
  const svg =
    `<svg xmlns="http://www.w3.org/2000/svg" width="160" height="60">` +
    `<rect width="160" height="60" fill="#f5f5f5"/>${lines}` +
    `<text x="80" y="38" text-anchor="middle" font-size="24" fill="#333" font-family="Arial, sans-serif">${text}</text>` +
    `</svg>`;
  return `data:image/svg+xml;base64,${Buffer.from(svg, 'utf8').toString('base64')}`;
}

function captchaKey(uuid: string): string {
  return `${RedisKeys.CAPTCHA_CODES.key}:${uuid}`;
}

@Injectable()
export class CaptchaService {
  constructor(
    private readonly redis: RedisService,
    private readonly sysConfig: SysConfigService,
    private readonly memoryStore: MemoryCaptchaStore,
  ) {}

  async generate(): Promise<CaptchaResp> {
    const captchaEnabled = await this.sysConfig.isCaptchaEnabled();
    const registerEnabled = await this.sysConfig.isRegisterEnabled();
    if (!captchaEnabled) {
      return { captchaEnabled, registerEnabled, img: '', uuid: '' };
    }
    const uuid = randomUUID();
    const { expression, answer } = createExpression();
    await this.store(uuid, answer);
    return { captchaEnabled, registerEnabled, img: renderCaptchaSvg(expression), uuid };
  }

  /**
   * 校验并消费验证码，忽略大小写。
   */
  async validate(uuid: string | undefined, code: string | undefined): Promise<void> {
    const expected = await this.take(uuid ?? '');
    if (expected === null) {
      throw new LoginException('验证码已失效');
    }
    if ((code ?? '').trim().toLowerCase() !== expected.toLowerCase()) {
      throw new LoginException('验证码错误');
    }
  }

  private async store(uuid: string, answer: string): Promise<void> {
    const ttl = captchaExpireMinutes() * 60;
    const saved = await this.redis.run(
      '保存验证码',
      async (client) => {
        await client.setex(captchaKey(uuid), ttl, answer);
        return true;
      },
      false,
    );
    if (!saved) {
      this.memoryStore.set(uuid, answer, ttl);
    }
  }

  private async take(uuid: string): Promise<string | null> {
    if (!uuid) return null;
    // 读取与删除在同一条命令内完成，验证码只能使用一次
    const cached = await this.redis.run('读取验证码', (client) => client.getdel(captchaKey(uuid)), null);
    return cached ?? this.memoryStore.take(uuid);
  }
}
