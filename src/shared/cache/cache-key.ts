import { createHash } from 'crypto';
import { EvictMode } from './cache.decorators';

function isSerializable(value: unknown): boolean {
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    return false;
  }
  try {
    JSON.stringify(value);
    return true;
  } catch {
    return false;
  }
}

/** 按键名排序后序列化，保证同一组参数得到同一个串。 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((v) => stableStringify(v)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => isSerializable(v))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * 缓存键：`${prefix}:${md5(prefix:类名:方法名:位置参数...:命名参数JSON)}`
 */
export function buildCacheKey(
  prefix: string,
  className: string,
  handlerName: string,
  args: unknown[],
  named: Record<string, unknown>,
): string {
  const parts: string[] = [prefix, className, handlerName];
  for (const arg of args) {
    if (isSerializable(arg)) parts.push(typeof arg === 'string' ? arg : stableStringify(arg));
  }
  const namedEntries = Object.entries(named).filter(([, v]) => isSerializable(v));
  if (namedEntries.length) {
    parts.push(stableStringify(Object.fromEntries(namedEntries)));
  }
  const digest = createHash('md5').update(parts.join(':')).digest('hex');
  return `${prefix}:${digest}`;
}

export function evictPattern(pattern: string, mode: EvictMode = 'exact'): string {
  switch (mode) {
    case 'prefix':
      return `${pattern}*`;
    case 'suffix':
      return `*${pattern}`;
    case 'contains':
      return `*${pattern}*`;
    default:
      return pattern;
  }
}
