export * from './callback.module';
export * from './callback.service';
export * from './events';
