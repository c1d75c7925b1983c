export * from './profile-signals.interface';
export * from './score-breakdown.interface';
export * from './social-score.interface';
