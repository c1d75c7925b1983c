import { registerAs } from '@nestjs/config';
import { env } from 'node:process';

export default registerAs('app', () => ({
  env: env.NODE_ENV || 'development',
  host: env.APP_HOST || '0.0.0.0',
  port: parseInt(env.APP_PORT || '7070', 10),
  globalPrefix: env.APP_GLOBAL_PREFIX,
  corsOrigins: env.APP_CORS_ORIGINS
    ? env.APP_CORS_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter(Boolean)
    : [],
}));
