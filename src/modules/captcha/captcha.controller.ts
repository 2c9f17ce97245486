import { Controller, Get } from '@nestjs/common';
import { ok } from '../../shared/api-response/api-response';
import { Public } from '../auth/login-user';
import { CaptchaService } from './captcha.service';

/**
 * 图片验证码：GET /captchaImage
 */
@Controller()
export class CaptchaController {
  constructor(private readonly captchaService: CaptchaService) {}

  @Public()
  @Get('/captchaImage')
  async getImageCaptcha() {
    return ok(await this.captchaService.generate());
  }
}
