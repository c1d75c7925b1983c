export * from './transform.interceptor';
