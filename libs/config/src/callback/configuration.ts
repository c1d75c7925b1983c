import { registerAs } from '@nestjs/config';
import { env } from 'node:process';

export default registerAs('callback', () => ({
  timeout: parseInt(env.CALLBACK_TIMEOUT || '10000', 10),
  maxAttempts: parseInt(env.CALLBACK_MAX_ATTEMPTS || '3', 10),
  baseDelay: parseInt(env.CALLBACK_BASE_DELAY || '1000', 10),
}));
