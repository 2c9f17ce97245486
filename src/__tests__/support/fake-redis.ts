import { RedisConnection, ScoredMember } from '../../shared/redis/redis.client';

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split('')
    .map((ch) => {
      if (ch === '*') return '.*';
      if (ch === '?') return '.';
      return ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${escaped}$`);
}

/**
 * 进程内 Redis 替身，实现业务用到的命令子集。
 */
export class FakeRedis implements RedisConnection {
  down = false;
  readonly strings = new Map<string, string>();
  readonly hashes = new Map<string, Map<string, string>>();
  readonly lists = new Map<string, string[]>();
  readonly zsets = new Map<string, Map<string, number>>();
  readonly expiries = new Map<string, number>();
  readonly commandCalls = new Map<string, number>();

  async connect(): Promise<void> {
    this.guard('connect');
  }

  disconnect(): void {
    // 无连接可断开
  }

  async ping(): Promise<string> {
    this.guard('ping');
    return 'PONG';
  }

  async get(key: string): Promise<string | null> {
    this.guard('get');
    this.evict(key);
    return this.strings.get(key) ?? null;
  }

  async getdel(key: string): Promise<string | null> {
    this.guard('getdel');
    this.evict(key);
    const value = this.strings.get(key) ?? null;
    this.remove(key);
    return value;
  }

  async set(key: string, value: string): Promise<unknown> {
    this.guard('set');
    this.remove(key);
    this.strings.set(key, value);
    return 'OK';
  }

  async setex(key: string, seconds: number, value: string): Promise<unknown> {
    this.guard('setex');
    this.remove(key);
    this.strings.set(key, value);
    this.expiries.set(key, Date.now() + seconds * 1000);
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    this.guard('del');
    let n = 0;
    for (const key of keys) {
      if (this.has(key)) n++;
      this.remove(key);
    }
    return n;
  }

  async exists(key: string): Promise<number> {
    this.guard('exists');
    return this.has(key) ? 1 : 0;
  }

  async keys(pattern: string): Promise<string[]> {
    this.guard('keys');
    const re = globToRegExp(pattern);
    return this.allKeys().filter((k) => re.test(k));
  }

  async expire(key: string, seconds: number): Promise<number> {
    this.guard('expire');
    if (!this.has(key)) return 0;
    this.expiries.set(key, Date.now() + seconds * 1000);
    return 1;
  }

  async ttl(key: string): Promise<number> {
    this.guard('ttl');
    if (!this.has(key)) return -2;
    const at = this.expiries.get(key);
    if (at === undefined) return -1;
    return Math.ceil((at - Date.now()) / 1000);
  }

  async hincrby(key: string, field: string, increment: number): Promise<number> {
    this.guard('hincrby');
    const hash = this.hash(key);
    const next = Number(hash.get(field) ?? '0') + increment;
    hash.set(field, String(next));
    return next;
  }

  async hset(key: string, field: string, value: string): Promise<number> {
    this.guard('hset');
    const hash = this.hash(key);
    const isNew = !hash.has(field);
    hash.set(field, value);
    return isNew ? 1 : 0;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    this.guard('hgetall');
    this.evict(key);
    return Object.fromEntries(this.hashes.get(key) ?? new Map<string, string>());
  }

  async lpush(key: string, value: string): Promise<number> {
    this.guard('lpush');
    this.evict(key);
    const list = this.lists.get(key) ?? [];
    list.unshift(value);
    this.lists.set(key, list);
    return list.length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    this.guard('lrange');
    this.evict(key);
    const list = this.lists.get(key) ?? [];
    const end = stop < 0 ? list.length + stop + 1 : stop + 1;
    return list.slice(start, end);
  }

  async zadd(key: string, score: number, member: string): Promise<unknown> {
    this.guard('zadd');
    this.evict(key);
    const zset = this.zsets.get(key) ?? new Map<string, number>();
    zset.set(member, score);
    this.zsets.set(key, zset);
    return 1;
  }

  async zremrangebyrank(key: string, start: number, stop: number): Promise<number> {
    this.guard('zremrangebyrank');
    const sorted = this.sortedMembers(key);
    const from = start < 0 ? sorted.length + start : start;
    const to = stop < 0 ? sorted.length + stop : stop;
    const zset = this.zsets.get(key);
    let removed = 0;
    for (let i = Math.max(from, 0); i <= to && i < sorted.length; i++) {
      zset?.delete(sorted[i].member);
      removed++;
    }
    return removed;
  }

  async zrangeWithScores(key: string, start: number, stop: number): Promise<ScoredMember[]> {
    this.guard('zrange');
    const sorted = this.sortedMembers(key);
    const end = stop < 0 ? sorted.length + stop + 1 : stop + 1;
    return sorted.slice(start, end);
  }

  async info(section?: string): Promise<string> {
    this.guard('info');
    if (section === 'commandstats') {
      const lines = ['# Commandstats'];
      for (const [name, calls] of this.commandCalls) {
        lines.push(`cmdstat_${name}:calls=${calls},usec=0,usec_per_call=0.00`);
      }
      return lines.join('\r\n');
    }
    return ['# Server', 'redis_version:7.2.0', 'redis_mode:standalone', '# Memory', 'used_memory_human:1.00M'].join('\r\n');
  }

  async dbsize(): Promise<number> {
    this.guard('dbsize');
    return this.allKeys().length;
  }

  async flushdb(): Promise<unknown> {
    this.guard('flushdb');
    this.strings.clear();
    this.hashes.clear();
    this.lists.clear();
    this.zsets.clear();
    this.expiries.clear();
    return 'OK';
  }

  private guard(command: string): void {
    if (this.down) {
      throw new Error('Connection is closed.');
    }
    this.commandCalls.set(command, (this.commandCalls.get(command) ?? 0) + 1);
  }

  private hash(key: string): Map<string, string> {
    this.evict(key);
    const hash = this.hashes.get(key) ?? new Map<string, string>();
    this.hashes.set(key, hash);
    return hash;
  }

  private sortedMembers(key: string): ScoredMember[] {
    this.evict(key);
    const zset = this.zsets.get(key) ?? new Map<string, number>();
    return Array.from(zset, ([member, score]) => ({ member, score })).sort(
      (a, b) => a.score - b.score || a.member.localeCompare(b.member),
    );
  }

  private allKeys(): string[] {
    const keys = [
      ...this.strings.keys(),
      ...this.hashes.keys(),
      ...this.lists.keys(),
      ...this.zsets.keys(),
    ];
    return keys.filter((k) => this.has(k));
  }

  private has(key: string): boolean {
    this.evict(key);
    return (
      this.strings.has(key) ||
      this.hashes.has(key) ||
      this.lists.has(key) ||
      this.zsets.has(key)
    );
  }

  private evict(key: string): void {
    const at = this.expiries.get(key);
    if (at !== undefined && at <= Date.now()) {
      this.remove(key);
    }
  }

  private remove(key: string): void {
    this.strings.delete(key);
    this.hashes.delete(key);
    this.lists.delete(key);
    this.zsets.delete(key);
    this.expiries.delete(key);
  }
}
