/**
 * 系统使用的 Redis 键前缀，同时作为缓存监控中的“缓存名称”。
 */
export const RedisKeys = {
  ACCESS_TOKEN: { key: 'access_token', remark: '登录令牌信息' },
  SYS_CONFIG: { key: 'sys_config', remark: '配置信息' },
  CAPTCHA_CODES: { key: 'captcha_codes', remark: '图片验证码' },
  SMS_CODE: { key: 'sms_code', remark: '短信验证码' },
  APP_CACHE: { key: 'app', remark: 'App用户接口缓存' },
  METRICS: { key: 'metrics', remark: '性能与业务指标' },
  ALERTS: { key: 'alerts', remark: '监控告警' },
} as const;

export type RedisKeyName = (typeof RedisKeys)[keyof typeof RedisKeys]['key'];
