import { Injectable } from '@nestjs/common';

/**
 * 应用启动状态：初始化完成前拒绝业务请求。
 */
@Injectable()
export class StartupState {
  private ready = false;
  private readyAt: Date | null = null;

  markReady(): void {
    this.ready = true;
    this.readyAt = new Date();
  }

  isReady(): boolean {
    return this.ready;
  }

  getReadyAt(): Date | null {
    return this.readyAt;
  }
}
