export * from './facebook-session.error';
