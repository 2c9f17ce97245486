import { Request } from 'express';

export interface ClientInfo {
  ip: string;
  location: string;
  browser: string;
  os: string;
}

function header(req: Request, name: string): string {
  const v = req.headers[name];
  if (Array.isArray(v)) return v[0] ?? '';
  return v ?? '';
}

/**
 * 取真实客户端 IP：优先 X-Forwarded-For 的第一个地址，其次 req.ip。
 */
export function realIp(req: Request): string {
  const forwarded = header(req, 'x-forwarded-for');
  const first = (forwarded.split(',')[0] || '').trim();
  const ip = first || req.ip || '';
  return ip.startsWith('::ffff:') ? ip.slice(7) : ip;
}

export function isInternalIp(ip: string): boolean {
  if (!ip || ip === '::1' || ip === '127.0.0.1' || ip === 'localhost') {
    return true;
  }
  if (ip.startsWith('10.') || ip.startsWith('192.168.')) return true;
  const m = /^172\.(\d+)\./.exec(ip);
  return m !== null && Number(m[1]) >= 16 && Number(m[1]) <= 31;
}

const BROWSERS: Array<[RegExp, string]> = [
  [/Edg\/(\d+)/, 'Edge'],
  [/OPR\/(\d+)/, 'Opera'],
  [/Firefox\/(\d+)/, 'Firefox'],
  [/Chrome\/(\d+)/, 'Chrome'],
  [/Version\/(\d+).*Safari/, 'Safari'],
  [/MSIE (\d+)|Trident\/.*rv:(\d+)/, 'IE'],
];

const SYSTEMS: Array<[RegExp, string]> = [
  [/Windows NT 10/, 'Windows 10'],
  [/Windows NT 6\.1/, 'Windows 7'],
  [/Windows/, 'Windows'],
  [/iPhone|iPad/, 'iOS'],
  [/Android/, 'Android'],
  [/Mac OS X/, 'Mac OS X'],
  [/Linux/, 'Linux'],
];

export function parseUserAgent(ua: string): { browser: string; os: string } {
  let browser = 'Unknown';
  for (const [re, name] of BROWSERS) {
    const m = re.exec(ua);
    if (m) {
      const version = m[1] ?? m[2];
      browser = version ? `${name} ${version}` : name;
      break;
    }
  }
  const os = SYSTEMS.find(([re]) => re.test(ua))?.[1] ?? 'Unknown';
  return { browser, os };
}

export function clientInfo(req: Request): ClientInfo {
  const ip = realIp(req);
  const { browser, os } = parseUserAgent(header(req, 'user-agent'));
  return {
    ip,
    location: isInternalIp(ip) ? '内网IP' : '未知',
    browser,
    os,
  };
}
