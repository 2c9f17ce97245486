import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { formatDateTime } from '../../../shared/time/time';

export interface CpuInfo {
  cpuNum: number;
  used: number;
  sys: number;
  free: number;
}

export interface MemInfo {
  total: number;
  used: number;
  free: number;
  usage: number;
}

export interface SysInfo {
  computerName: string;
  computerIp: string;
  osName: string;
  osArch: string;
  userDir: string;
}

export interface NodeInfo {
  name: string;
  version: string;
  startTime: string;
  runTime: string;
  home: string;
  memory: { rss: string; heapTotal: string; heapUsed: string };
}

export interface SysFile {
  dirName: string;
  sysTypeName: string;
  typeName: string;
  total: string;
  free: string;
  used: string;
  usage: string;
}

export interface ServerInfo {
  cpu: CpuInfo;
  mem: MemInfo;
  sys: SysInfo;
  node: NodeInfo;
  sysFiles: SysFile[];
}

const GB = 1024 * 1024 * 1024;

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/** 运行时长：X天Y小时Z分钟 */
export function formatRunTime(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const days = Math.floor(total / 86400);
  const hours = Math.floor((total % 86400) / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  return `${days}天${hours}小时${minutes}分钟`;
}

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let i = 0;
  while (value >= 1024 && i < units.length - 1) {
    value /= 1024;
    i++;
  }
  return i === 0 ? `${value}B` : `${value.toFixed(2)}${units[i]}`;
}

function firstExternalIPv4(): string {
  for (const list of Object.values(os.networkInterfaces())) {
    for (const addr of list ?? []) {
      if (addr.family === 'IPv4' && !addr.internal) return addr.address;
    }
  }
  return '127.0.0.1';
}

/**
 * 服务器信息采集，每一项单独兜底，失败时返回默认值。
 */
@Injectable()
export class ServerService {
  private readonly logger = new Logger(ServerService.name);

  async info(): Promise<ServerInfo> {
    return {
      cpu: this.safe('CPU', () => this.cpu(), { cpuNum: 0, used: 0, sys: 0, free: 0 }),
      mem: this.safe('内存', () => this.mem(), { total: 0, used: 0, free: 0, usage: 0 }),
      sys: this.safe('主机', () => this.sys(), {
        computerName: 'Unknown',
        computerIp: '127.0.0.1',
        osName: 'Unknown',
        osArch: 'Unknown',
        userDir: 'Unknown',
      }),
      node: this.safe('Node', () => this.node(), {
        name: 'Unknown',
        version: 'Unknown',
        startTime: 'Unknown',
        runTime: 'Unknown',
        home: 'Unknown',
        memory: { rss: '0B', heapTotal: '0B', heapUsed: '0B' },
      }),
      sysFiles: await this.sysFiles(),
    };
  }

  private cpu(): CpuInfo {
    const cpus = os.cpus();
    let user = 0;
    let sys = 0;
    let idle = 0;
    let total = 0;
    for (const { times } of cpus) {
      user += times.user + times.nice;
      sys += times.sys + times.irq;
      idle += times.idle;
      total += times.user + times.nice + times.sys + times.irq + times.idle;
    }
    if (!total) return { cpuNum: cpus.length, used: 0, sys: 0, free: 0 };
    return {
      cpuNum: cpus.length,
      used: round2((user / total) * 100),
      sys: round2((sys / total) * 100),
      free: round2((idle / total) * 100),
    };
  }

  private mem(): MemInfo {
    const total = os.totalmem();
    const free = os.freemem();
    return {
      total: round2(total / GB),
      used: round2((total - free) / GB),
      free: round2(free / GB),
      usage: total ? round2(((total - free) / total) * 100) : 0,
    };
  }

  private sys(): SysInfo {
    return {
      computerName: os.hostname(),
      computerIp: firstExternalIPv4(),
      osName: `${os.type()} ${os.release()}`,
      osArch: os.arch(),
      userDir: process.cwd(),
    };
  }

  private node(): NodeInfo {
    const uptime = process.uptime();
    const usage = process.memoryUsage();
    return {
      name: 'Node.js',
      version: process.version,
      startTime: formatDateTime(new Date(Date.now() - uptime * 1000)),
      runTime: formatRunTime(uptime),
      home: process.execPath,
      memory: {
        rss: formatBytes(usage.rss),
        heapTotal: formatBytes(usage.heapTotal),
        heapUsed: formatBytes(usage.heapUsed),
      },
    };
  }

  private async sysFiles(): Promise<SysFile[]> {
    const dir = path.parse(process.cwd()).root;
    try {
      const stat = await fs.statfs(dir);
      const total = stat.blocks * stat.bsize;
      const free = stat.bavail * stat.bsize;
      const used = total - free;
      return [
        {
          dirName: dir,
          sysTypeName: String(stat.type),
          typeName: `本地固定磁盘（${dir}）`,
          total: formatBytes(total),
          free: formatBytes(free),
          used: formatBytes(used),
          usage: total ? `${round2((used / total) * 100)}%` : '0%',
        },
      ];
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`获取磁盘信息失败: ${message}`);
      return [];
    }
  }

  private safe<T>(label: string, fn: () => T, fallback: T): T {
    try {
      return fn();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`获取${label}信息失败: ${message}`);
      return fallback;
    }
  }
}
