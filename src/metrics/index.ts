export * from './metrics.interceptor';
export * from './metrics.module';
export * from './metrics.service';
