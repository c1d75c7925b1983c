/**
 * Signals extracted from a single profile page.
 *
 * Every field is always populated; unmatched rules leave their default.
 */
export interface ProfileSignals {
  readonly username: string;
  readonly is_verified: boolean;
  readonly followers: number;
  readonly posts_count: number;
  /** Interactions per post, capped at 0.9 */
  readonly engagement_rate: number;
  readonly bio_length: number;
  readonly has_profile_photo: boolean;
  readonly has_cover_photo: boolean;
}
