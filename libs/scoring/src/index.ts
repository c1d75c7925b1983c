export * from './aggregation';
export * from './enums';
export * from './errors';
export * from './interfaces';
export * from './pipeline';
export * from './profile-extractor';
export * from './score-engine';
export * from './score-scaler';
