import { ProfileScoreResult } from './interfaces';
import { ExtractionOptions, extractProfileSignals } from './profile-extractor';
import { scoreProfile, toScoreBuckets } from './score-engine';
import { DEFAULT_RAW_RANGE, RawScoreRange, scaleToRange } from './score-scaler';

export interface PipelineOptions extends ExtractionOptions {
  range?: RawScoreRange;
}

/**
 * Runs extraction, scoring and scaling for one profile page.
 */
export function scoreProfilePage(
  html: string,
  username: string,
  options: PipelineOptions = {},
): ProfileScoreResult {
  const signals = extractProfileSignals(html, username, options);
  const breakdown = scoreProfile(signals);

  return {
    username,
    score: scaleToRange(breakdown.total_score, options.range ?? DEFAULT_RAW_RANGE),
    tier: breakdown.tier,
    breakdown: toScoreBuckets(breakdown),
  };
}
