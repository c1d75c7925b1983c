import { registerAs } from '@nestjs/config';
import { env } from 'node:process';

export default registerAs('facebook', () => ({
  baseUrl: env.FACEBOOK_BASE_URL,
  cookiePath: env.FACEBOOK_COOKIE_PATH,
  timeout: env.FACEBOOK_REQUEST_TIMEOUT
    ? parseInt(env.FACEBOOK_REQUEST_TIMEOUT, 10)
    : 30000,
  userAgent: env.FACEBOOK_USER_AGENT,
  concurrency: env.FACEBOOK_FETCH_CONCURRENCY
    ? parseInt(env.FACEBOOK_FETCH_CONCURRENCY, 10)
    : 3,
}));
