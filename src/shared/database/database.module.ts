import { Global, Module } from '@nestjs/common';
import { DatabaseService } from './database.service';

/**
 * 数据库全局模块。
 */
@Global()
@Module({
  providers: [DatabaseService],
  exports: [DatabaseService],
})
export class DatabaseModule {}
