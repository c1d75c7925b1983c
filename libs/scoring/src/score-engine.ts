import { sumBy } from 'lodash';

import { ProfileTier } from './enums';
import {
  DimensionScores,
  ProfileSignals,
  ScoreBreakdown,
  ScoreBuckets,
  ScoreDimension,
} from './interfaces';

export const SCORE_WEIGHTS: Readonly<DimensionScores> = {
  verification: 0.15,
  followers: 0.3,
  engagement: 0.25,
  completeness: 0.15,
  activity: 0.15,
};

export const SCORE_DIMENSIONS: readonly ScoreDimension[] = [
  'verification',
  'followers',
  'engagement',
  'completeness',
  'activity',
];

const VERIFIED_BONUS = 10;

/**
 * Follower thresholds, highest first. Verified profiles reach each tier
 * with a smaller audience.
 */
const TIER_THRESHOLDS: Record<'verified' | 'unverified', [number, ProfileTier][]> = {
  verified: [
    [5_000_000, ProfileTier.Elite],
    [500_000, ProfileTier.Premium],
    [0, ProfileTier.Standard],
  ],
  unverified: [
    [10_000_000, ProfileTier.Elite],
    [1_000_000, ProfileTier.Premium],
    [100_000, ProfileTier.Standard],
    [0, ProfileTier.Basic],
  ],
};

export function determineTier(followers: number, isVerified: boolean): ProfileTier {
  const thresholds = TIER_THRESHOLDS[isVerified ? 'verified' : 'unverified'];
  const match = thresholds.find(([minimum]) => followers >= minimum);
  return match ? match[1] : ProfileTier.Basic;
}

export function computeRawScores(signals: ProfileSignals): DimensionScores {
  const followers = Math.max(1, signals.followers);
  const posts = Math.max(1, signals.posts_count);
  const bonus = signals.is_verified ? VERIFIED_BONUS : 0;

  return {
    verification: signals.is_verified ? 100 : 0,
    followers: Math.min(100, Math.log10(followers) * 20 + bonus),
    engagement: Math.min(100, signals.engagement_rate * 100),
    completeness:
      (signals.has_profile_photo ? 40 : 0) +
      (signals.has_cover_photo ? 30 : 0) +
      Math.min(30, signals.bio_length / 10),
    activity: Math.min(100, Math.log10(posts) * 25 + bonus),
  };
}

/**
 * Scores a profile. Pure; the logarithms are always defined because
 * counts are floored at 1.
 */
export function scoreProfile(signals: ProfileSignals): ScoreBreakdown {
  const raw = computeRawScores(signals);

  const weighted = SCORE_DIMENSIONS.reduce<DimensionScores>(
    (acc, dimension) => ({
      ...acc,
      [dimension]: raw[dimension] * SCORE_WEIGHTS[dimension],
    }),
    { ...raw },
  );

  const total = sumBy(SCORE_DIMENSIONS, (dimension) => weighted[dimension]);

  return {
    raw_scores: raw,
    weighted_scores: weighted,
    total_score: total,
    tier: determineTier(Math.max(1, signals.followers), signals.is_verified),
  };
}

/**
 * Groups the raw dimension scores into the three reported buckets.
 */
export function toScoreBuckets(breakdown: ScoreBreakdown): ScoreBuckets {
  const raw = breakdown.raw_scores;

  return {
    profile_score: {
      value: raw.verification + raw.completeness,
      max: 200,
    },
    network_score: {
      value: raw.followers,
      max: 100,
    },
    activity_score: {
      value: raw.engagement + raw.activity,
      max: 200,
    },
  };
}
