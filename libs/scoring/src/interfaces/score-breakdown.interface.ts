import { ProfileTier } from '../enums';

export type ScoreDimension =
  | 'verification'
  | 'followers'
  | 'engagement'
  | 'completeness'
  | 'activity';

export type DimensionScores = Record<ScoreDimension, number>;

export interface ScoreBreakdown {
  raw_scores: DimensionScores;
  weighted_scores: DimensionScores;
  total_score: number;
  tier: ProfileTier;
}
