export * from './profile-tier.enum';
export * from './risk-level.enum';
