import { ProfileTier, RiskLevel } from '../enums';

export type ScoreBucketName = 'profile_score' | 'network_score' | 'activity_score';

export interface ScoreBucket {
  value: number;
  max: number;
}

export type ScoreBuckets = Record<ScoreBucketName, ScoreBucket>;

/**
 * Scaled result for one profile, the unit the aggregation works on.
 */
export interface ProfileScoreResult {
  username: string;
  score: number;
  tier: ProfileTier;
  breakdown: ScoreBuckets;
}

/**
 * Averaged social score for one identity.
 */
export interface SocialScoreResponse {
  fayda_number: string;
  score: number;
  score_range: string;
  risk_level: RiskLevel;
  score_breakdown: ScoreBuckets;
  timestamp: string;
  type: string;
}
