export * from './sentry-client.module';
export * from './sentry-client.service';
