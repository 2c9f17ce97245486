import * as dotenv from 'dotenv';

// 优先从 .env 加载环境变量；所有读取函数在调用时取值，便于测试覆盖
dotenv.config();

function str(name: string, fallback: string): string {
  const v = process.env[name];
  return v === undefined || v === '' ? fallback : v;
}

function int(name: string, fallback: number): number {
  const n = Number.parseInt(process.env[name] ?? '', 10);
  return Number.isFinite(n) ? n : fallback;
}

function bool(name: string, fallback: boolean): boolean {
  const v = (process.env[name] ?? '').trim().toLowerCase();
  if (!v) return fallback;
  return v === 'true' || v === '1' || v === 'yes';
}

export interface AppConfig {
  name: string;
  version: string;
  port: number;
}

export interface DatabaseConfig {
  connectionString: string;
  max: number;
}

export interface RedisConfig {
  enabled: boolean;
  host: string;
  port: number;
  password?: string;
  db: number;
}

export interface TokenConfig {
  secret: string;
  expireMinutes: number;
}

export function appConfig(): AppConfig {
  return {
    name: str('APP_NAME', 'ruoyi-node-admin'),
    version: str('APP_VERSION', '1.0.0'),
    port: int('HTTP_PORT', 9099),
  };
}

/**
 * 如未显式提供 DATABASE_URL，则根据 DB_* 环境变量拼接。
 */
export function databaseConfig(): DatabaseConfig {
  let url = process.env.DATABASE_URL;
  if (!url) {
    const host = str('DB_HOST', '127.0.0.1');
    const port = str('DB_PORT', '5432');
    const user = str('DB_USER', 'postgres');
    const password = str('DB_PWD', 'postgres');
    const dbName = str('DB_NAME', 'ruoyi');
    const sslmode = str('DB_SSLMODE', 'disable');
    url = `postgresql://${user}:${encodeURIComponent(
      password,
    )}@${host}:${port}/${dbName}?sslmode=${sslmode}`;
  }
  return { connectionString: url, max: int('DB_POOL_SIZE', 10) };
}

export function redisConfig(): RedisConfig {
  const password = process.env.REDIS_PASSWORD;
  return {
    enabled: bool('REDIS_ENABLED', true),
    host: str('REDIS_HOST', '127.0.0.1'),
    port: int('REDIS_PORT', 6379),
    password: password ? password : undefined,
    db: int('REDIS_DB', 0),
  };
}

/** 管理端 Token 配置。 */
export function adminTokenConfig(): TokenConfig {
  return {
    secret: str('AUTH_JWT_SECRET', 'change-me'),
    expireMinutes: int('AUTH_JWT_EXPIRE_MINUTES', 1440),
  };
}

/** App 端 Token 配置。 */
export function appTokenConfig(): TokenConfig {
  return {
    secret: str('APP_JWT_SECRET', 'change-me-too'),
    expireMinutes: int('APP_JWT_EXPIRE_MINUTES', 10080),
  };
}

export function captchaExpireMinutes(): number {
  return int('CAPTCHA_EXPIRE_MINUTES', 2);
}
