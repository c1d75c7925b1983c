export * from './score-completed.event';
