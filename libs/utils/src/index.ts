export * from './async.util';
