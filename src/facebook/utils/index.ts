export * from './facebook.utils';
