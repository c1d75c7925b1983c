import * as Sentry from '@sentry/nestjs';
import { env } from 'node:process';

// Must be imported before any other module
Sentry.init({
  dsn: env.SENTRY_DSN,
  environment: env.NODE_ENV || 'development',
  enabled: Boolean(env.SENTRY_DSN),
  tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE
    ? parseFloat(env.SENTRY_TRACES_SAMPLE_RATE)
    : 0,
});
