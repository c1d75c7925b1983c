export * from './central-score-request.dto';
