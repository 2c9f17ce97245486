import { Global, Module } from '@nestjs/common';
import { PgSysConfigDao, SysConfigDao } from './sys-config.dao';
import { SysConfigService } from './sys-config.service';

@Global()
@Module({
  providers: [{ provide: SysConfigDao, useClass: PgSysConfigDao }, SysConfigService],
  exports: [SysConfigService],
})
export class SysConfigModule {}
