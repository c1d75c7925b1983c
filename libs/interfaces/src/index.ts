export * from './common/response.interface';
