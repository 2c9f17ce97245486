import { MemoryLoginLogDao } from '../../../__tests__/support/memory-daos';
import { isInternalIp, parseUserAgent } from '../../../shared/request/client-info';
import { LogininforService } from '../logininfor/logininfor.service';

describe('LogininforService', () => {
  let dao: MemoryLoginLogDao;
  let service: LogininforService;

  beforeEach(() => {
    dao = new MemoryLoginLogDao();
    service = new LogininforService(dao);
    const base = { ipaddr: '127.0.0.1', loginLocation: '内网IP', browser: 'Chrome 120', os: 'Linux', msg: '登录成功' };
    dao.logs.push(
      { ...base, id: 1, userName: 'admin', status: '0', loginTime: new Date(2024, 0, 2, 3, 4, 5) },
      { ...base, id: 2, userName: 'alice', status: '1', msg: '密码错误', loginTime: new Date(2024, 0, 3) },
      { ...base, id: 3, userName: 'admin', status: '1', msg: '密码错误', loginTime: null },
    );
  });

  it('pages newest first and maps to the response shape', async () => {
    const page = await service.page({ pageNum: 1, pageSize: 2 });
    expect(page.total).toBe(3);
    expect(page.totalPages).toBe(2);
    expect(page.rows.map((r) => r.infoId)).toEqual([3, 2]);
    expect(page.rows[0].loginTime).toBe('');
  });

  it('filters by user name and status', async () => {
    const page = await service.page({ userName: ' ADM ', status: '0' });
    expect(page.rows).toEqual([
      {
        infoId: 1,
        userName: 'admin',
        ipaddr: '127.0.0.1',
        loginLocation: '内网IP',
        browser: 'Chrome 120',
        os: 'Linux',
        status: '0',
        msg: '登录成功',
        loginTime: '2024-01-02 03:04:05',
      },
    ]);
  });

  it('removes by ids and cleans everything', async () => {
    await expect(service.remove([])).rejects.toThrow('请选择要删除的日志');
    expect(await service.remove([1, 9])).toBe(1);
    expect(await service.clean()).toBe(2);
    expect(dao.logs).toEqual([]);
  });
});

describe('client info', () => {
  it('parses browser and system from the user agent', () => {
    expect(
      parseUserAgent(
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
      ),
    ).toEqual({ browser: 'Chrome 120', os: 'Windows 10' });
    expect(
      parseUserAgent('Mozilla/5.0 (Windows NT 10.0) AppleWebKit/537.36 Chrome/120.0 Safari/537.36 Edg/121.0'),
    ).toEqual({ browser: 'Edge 121', os: 'Windows 10' });
    expect(
      parseUserAgent(
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15',
      ),
    ).toEqual({ browser: 'Safari 17', os: 'Mac OS X' });
    expect(parseUserAgent('')).toEqual({ browser: 'Unknown', os: 'Unknown' });
  });

  it('recognises internal addresses', () => {
    expect(isInternalIp('')).toBe(true);
    expect(isInternalIp('::1')).toBe(true);
    expect(isInternalIp('10.1.2.3')).toBe(true);
    expect(isInternalIp('192.168.0.8')).toBe(true);
    expect(isInternalIp('172.16.0.1')).toBe(true);
    expect(isInternalIp('172.32.0.1')).toBe(false);
    expect(isInternalIp('8.8.8.8')).toBe(false);
  });
});
