export * from './app/config.module';
export * from './app/config.service';
export * from './callback/config.module';
export * from './callback/config.service';
export * from './facebook/config.module';
export * from './facebook/config.service';
export * from './scoring/config.module';
export * from './scoring/config.service';
