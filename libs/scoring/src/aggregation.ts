import { meanBy } from 'lodash';

import { EmptyInputError } from './errors';
import {
  ProfileScoreResult,
  ScoreBucketName,
  ScoreBuckets,
  SocialScoreResponse,
} from './interfaces';
import { getRiskLevel, SCORE_RANGE_LABEL } from './score-scaler';

export const SOCIAL_SCORE_TYPE = 'SOCIAL_SCORE';

const BUCKET_NAMES: readonly ScoreBucketName[] = [
  'profile_score',
  'network_score',
  'activity_score',
];

/**
 * Rounds half-up, so 649.5 reports as 650.
 */
export function roundScore(value: number): number {
  return Math.floor(value + 0.5);
}

export function averageBuckets(results: ProfileScoreResult[]): ScoreBuckets {
  if (results.length === 0) {
    throw new EmptyInputError();
  }

  const [first] = results;

  return BUCKET_NAMES.reduce<ScoreBuckets>(
    (acc, name) => ({
      ...acc,
      [name]: {
        value: meanBy(results, (result) => result.breakdown[name].value),
        max: first.breakdown[name].max,
      },
    }),
    { ...first.breakdown },
  );
}

/**
 * Combines the scaled results of one request into a single response.
 *
 * The risk level is classified from the reported (rounded) score, so the
 * label always matches the number returned.
 */
export function aggregateScores(
  faydaNumber: string,
  results: ProfileScoreResult[],
  now: Date = new Date(),
): SocialScoreResponse {
  if (results.length === 0) {
    throw new EmptyInputError();
  }

  const score = roundScore(meanBy(results, (result) => result.score));

  return {
    fayda_number: faydaNumber,
    score,
    score_range: SCORE_RANGE_LABEL,
    risk_level: getRiskLevel(score),
    score_breakdown: averageBuckets(results),
    timestamp: now.toISOString(),
    type: SOCIAL_SCORE_TYPE,
  };
}
