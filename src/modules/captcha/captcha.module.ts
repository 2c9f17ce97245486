import { Module } from '@nestjs/common';
import { CaptchaController } from './captcha.controller';
import { CaptchaService } from './captcha.service';
import { MemoryCaptchaStore } from './captcha.store';

@Module({
  controllers: [CaptchaController],
  providers: [CaptchaService, MemoryCaptchaStore],
  exports: [CaptchaService],
})
export class CaptchaModule {}
