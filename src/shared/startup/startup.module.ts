import { Global, Module } from '@nestjs/common';
import { StartupState } from './startup-state';

@Global()
@Module({
  providers: [StartupState],
  exports: [StartupState],
})
export class StartupModule {}
