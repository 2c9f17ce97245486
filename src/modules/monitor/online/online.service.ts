import { Injectable } from '@nestjs/common';
import { ServiceException } from '../../../shared/exception/exceptions';
import { OnlineSession, SessionService } from '../../auth/session/session.service';

export interface OnlineQuery {
  ipaddr?: string;
  userName?: string;
}

/**
 * 按条件筛选在线会话：带任一条件时只返回第一条完全匹配的记录。
 */
export function filterOnline(sessions: OnlineSession[], query: OnlineQuery): OnlineSession[] {
  const userName = query.userName?.trim();
  const ipaddr = query.ipaddr?.trim();
  if (!userName && !ipaddr) return sessions;
  const match = sessions.find(
    (s) => (!userName || s.userName === userName) && (!ipaddr || s.ipaddr === ipaddr),
  );
  return match ? [match] : [];
}

@Injectable()
export class OnlineService {
  constructor(private readonly sessionService: SessionService) {}

  async list(query: OnlineQuery): Promise<{ rows: OnlineSession[]; total: number }> {
    const rows = filterOnline(await this.sessionService.listOnline(), query);
    return { rows, total: rows.length };
  }

  /** 强退：删除对应的 access_token 键。 */
  async forceLogout(tokenIds: string): Promise<number> {
    const ids = tokenIds
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s);
    if (!ids.length) {
      throw new ServiceException('传入session_id为空');
    }
    return this.sessionService.remove(ids);
  }
}
