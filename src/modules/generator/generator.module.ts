import { Module } from '@nestjs/common';
import { ModuleGenController } from './module-gen.controller';
import { ModuleGenService } from './module-gen.service';

@Module({
  controllers: [ModuleGenController],
  providers: [{ provide: ModuleGenService, useFactory: () => new ModuleGenService() }],
})
export class GeneratorModule {}
