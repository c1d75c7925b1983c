import { SocialScoreResponse } from '@libs/scoring';

export const SOCIAL_SCORE_REQUEST_TYPE = 'SOCIAL_SCORE';
export const FACEBOOK_NETWORK = 'facebook';

/**
 * Response of the central scoring endpoint, also the callback payload.
 */
export interface CentralScoreResponse {
  fayda_number: string;
  combined_scores: {
    [SOCIAL_SCORE_REQUEST_TYPE]: SocialScoreResponse;
  };
}
