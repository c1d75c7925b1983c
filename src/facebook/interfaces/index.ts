export * from './central-score.interface';
export * from './profile-page-fetcher.interface';
export * from './stored-cookie.interface';
