export * from './dto';
export * from './errors';
export * from './facebook.module';
export * from './facebook.service';
export * from './interfaces';
