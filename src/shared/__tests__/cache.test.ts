import { createHash } from 'crypto';
import { Controller, Delete, Get, INestApplication, Param, Query } from '@nestjs/common';
import { APP_INTERCEPTOR, Reflector } from '@nestjs/core';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { FakeRedis } from '../../__tests__/support/fake-redis';
import { ok } from '../api-response/api-response';
import { buildCacheKey, evictPattern, stableStringify } from '../cache/cache-key';
import { CacheEvict, Cacheable } from '../cache/cache.decorators';
import { CacheInterceptor } from '../cache/cache.interceptor';
import { RedisService } from '../redis/redis.service';

describe('cache keys', () => {
  it('sorts object keys and drops undefined values', () => {
    expect(stableStringify({ b: [1, { d: 1, c: 2 }], a: undefined })).toBe('{"b":[1,{"c":2,"d":1}]}');
  });

  it('hashes prefix, class, handler and arguments', () => {
    const digest = createHash('md5').update('p:C:h:7:{"a":2,"b":1}').digest('hex');
    expect(buildCacheKey('p', 'C', 'h', ['7'], { b: 1, a: 2 })).toBe(`p:${digest}`);
  });

  it('does not depend on the order of named arguments', () => {
    expect(buildCacheKey('p', 'C', 'h', [], { b: 1, a: 2 })).toBe(buildCacheKey('p', 'C', 'h', [], { a: 2, b: 1 }));
  });

  it('builds eviction patterns', () => {
    expect(evictPattern('app:user:', 'prefix')).toBe('app:user:*');
    expect(evictPattern(':detail', 'suffix')).toBe('*:detail');
    expect(evictPattern('user', 'contains')).toBe('*user*');
    expect(evictPattern('app:stats:overview')).toBe('app:stats:overview');
  });
});

@Controller('/items')
class ItemController {
  calls = 0;

  @Get('/:id')
  @Cacheable({ prefix: 'test:item', ttl: 60 })
  get(@Param('id') id: string, @Query('q') q?: string) {
    this.calls++;
    return ok({ id, q: q ?? null, calls: this.calls });
  }

  @Delete('/:id')
  @CacheEvict({ pattern: 'test:item', mode: 'prefix' })
  remove() {
    return ok(null);
  }
}

describe('CacheInterceptor', () => {
  let app: INestApplication;
  let fake: FakeRedis;
  let controller: ItemController;

  beforeEach(async () => {
    fake = new FakeRedis();
    const moduleRef = await Test.createTestingModule({
      controllers: [ItemController],
      providers: [
        { provide: RedisService, useValue: new RedisService(() => fake) },
        { provide: APP_INTERCEPTOR, useClass: CacheInterceptor },
      ],
    }).compile();
    app = moduleRef.createNestApplication({ logger: false });
    await app.init();
    controller = app.get(ItemController);
  });

  afterEach(async () => {
    await app.close();
  });

  it('serves the second call from the cache', async () => {
    const first = await request(app.getHttpServer()).get('/items/1?q=a').expect(200);
    const second = await request(app.getHttpServer()).get('/items/1?q=a').expect(200);
    expect(first.body.data).toEqual({ id: '1', q: 'a', calls: 1 });
    expect(second.body.data).toEqual({ id: '1', q: 'a', calls: 1 });
    expect(controller.calls).toBe(1);

    const key = buildCacheKey('test:item', 'ItemController', 'get', ['1'], { q: 'a' });
    expect(fake.strings.has(key)).toBe(true);
    expect(await fake.ttl(key)).toBe(60);
  });

  it('keys on the arguments', async () => {
    await request(app.getHttpServer()).get('/items/1').expect(200);
    const other = await request(app.getHttpServer()).get('/items/2').expect(200);
    expect(other.body.data.calls).toBe(2);
  });

  it('evicts by prefix after a successful write', async () => {
    await request(app.getHttpServer()).get('/items/1').expect(200);
    await request(app.getHttpServer()).delete('/items/1').expect(200);
    expect(await fake.keys('test:item*')).toEqual([]);
    const again = await request(app.getHttpServer()).get('/items/1').expect(200);
    expect(again.body.data.calls).toBe(2);
  });

  it('runs the handler every time while redis is down', async () => {
    fake.down = true;
    await request(app.getHttpServer()).get('/items/1').expect(200);
    const second = await request(app.getHttpServer()).get('/items/1').expect(200);
    expect(second.body.data.calls).toBe(2);
  });

  it('reports the number of evicted keys', async () => {
    await fake.set('test:item:a', '1');
    await fake.set('test:item:b', '1');
    await fake.set('other:c', '1');
    const interceptor = new CacheInterceptor(new Reflector(), new RedisService(() => fake));
    expect(await interceptor.evict([{ pattern: 'test:item', mode: 'prefix' }])).toBe(2);
  });
});
