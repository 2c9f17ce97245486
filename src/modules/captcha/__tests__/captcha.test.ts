import { FakeRedis } from '../../../__tests__/support/fake-redis';
import { MemorySysConfigDao } from '../../../__tests__/support/memory-daos';
import { LoginException } from '../../../shared/exception/exceptions';
import { RedisService } from '../../../shared/redis/redis.service';
import { SysConfigService } from '../../../shared/sys-config/sys-config.service';
import { CaptchaService, createExpression, renderCaptchaSvg } from '../captcha.service';
import { MemoryCaptchaStore } from '../captcha.store';

function sequence(values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

describe('createExpression', () => {
  it('builds an addition', () => {
    expect(createExpression(sequence([0.5, 0.25, 0]))).toEqual({ expression: '5 + 2 = ?', answer: '7' });
  });

  it('swaps operands so a subtraction never goes negative', () => {
    expect(createExpression(sequence([0.1, 0.7, 0.5]))).toEqual({ expression: '7 - 1 = ?', answer: '6' });
  });

  it('builds a multiplication', () => {
    expect(createExpression(sequence([0.3, 0.4, 0.9]))).toEqual({ expression: '3 × 4 = ?', answer: '12' });
  });
});

describe('renderCaptchaSvg', () => {
  it('embeds the expression in a base64 svg', () => {
    const url = renderCaptchaSvg('1 + 1 = ?', sequence([0.5]));
    expect(url.startsWith('data:image/svg+xml;base64,')).toBe(true);
    const svg = Buffer.from(url.slice('data:image/svg+xml;base64,'.length), 'base64').toString('utf8');
    expect(svg).toContain('>1 + 1 = ?</text>');
  });
});

describe('MemoryCaptchaStore', () => {
  it('reads a code once', () => {
    const store = new MemoryCaptchaStore();
    store.set('u1', '8', 60);
    expect(store.take('u1')).toBe('8');
    expect(store.take('u1')).toBeNull();
  });

  it('treats expired codes as missing', () => {
    const store = new MemoryCaptchaStore();
    store.set('u1', '8', -1);
    expect(store.take('u1')).toBeNull();
  });
});

describe('CaptchaService', () => {
  let fake: FakeRedis;
  let config: MemorySysConfigDao;
  let service: CaptchaService;

  beforeEach(() => {
    fake = new FakeRedis();
    config = new MemorySysConfigDao({
      'sys.account.captchaEnabled': 'true',
      'sys.account.registerUser': 'false',
    });
    const redis = new RedisService(() => fake);
    service = new CaptchaService(redis, new SysConfigService(config, redis), new MemoryCaptchaStore());
  });

  async function storedAnswer(uuid: string): Promise<string> {
    const answer = await fake.get(`captcha_codes:${uuid}`);
    if (answer === null) throw new Error('captcha not stored');
    return answer;
  }

  it('stores the answer in redis with the configured expiry', async () => {
    const resp = await service.generate();
    expect(resp.captchaEnabled).toBe(true);
    expect(resp.registerEnabled).toBe(false);
    expect(resp.img.startsWith('data:image/svg+xml;base64,')).toBe(true);
    await storedAnswer(resp.uuid);
    expect(await fake.ttl(`captcha_codes:${resp.uuid}`)).toBe(120);
  });

  it('accepts the right answer once', async () => {
    const { uuid } = await service.generate();
    const answer = await storedAnswer(uuid);
    await expect(service.validate(uuid, ` ${answer} `)).resolves.toBeUndefined();
    await expect(service.validate(uuid, answer)).rejects.toThrow(new LoginException('验证码已失效'));
  });

  it('accepts only one of two concurrent validations', async () => {
    const { uuid } = await service.generate();
    const answer = await storedAnswer(uuid);
    const results = await Promise.allSettled([service.validate(uuid, answer), service.validate(uuid, answer)]);
    expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected']);
    expect(await fake.get(`captcha_codes:${uuid}`)).toBeNull();
  });

  it('rejects a wrong answer', async () => {
    const { uuid } = await service.generate();
    const answer = await storedAnswer(uuid);
    await expect(service.validate(uuid, `${answer}0`)).rejects.toThrow('验证码错误');
  });

  it('rejects a missing uuid', async () => {
    await expect(service.validate(undefined, '1')).rejects.toThrow('验证码已失效');
  });

  it('returns no image when the captcha is switched off', async () => {
    config.values['sys.account.captchaEnabled'] = 'false';
    expect(await service.generate()).toEqual({
      captchaEnabled: false,
      registerEnabled: false,
      img: '',
      uuid: '',
    });
  });

  it('keeps working from memory while redis is down', async () => {
    fake.down = true;
    const { uuid, img } = await service.generate();
    expect(img).not.toBe('');
    await expect(service.validate(uuid, 'not-a-number')).rejects.toThrow('验证码错误');
    await expect(service.validate(uuid, 'not-a-number')).rejects.toThrow('验证码已失效');
  });
});
