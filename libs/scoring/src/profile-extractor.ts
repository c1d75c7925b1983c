import { ProfileSignals } from './interfaces';

export const DEFAULT_FOLLOWERS = 10000;
export const DEFAULT_POSTS_COUNT = 10;
export const DEFAULT_ENGAGEMENT_RATE = 0;
export const DEFAULT_BIO_LENGTH = 100;
export const MAX_ENGAGEMENT_RATE = 0.9;

export type SignalName =
  | 'is_verified'
  | 'followers'
  | 'engagement_rate'
  | 'has_profile_photo'
  | 'has_cover_photo'
  | 'bio_length';

export interface ExtractionOptions {
  /** Called when a rule throws and its field falls back to the default. */
  onSignalError?: (signal: SignalName, error: unknown) => void;
}

export const VERIFICATION_MARKERS: readonly RegExp[] = [
  /"is_verified":\s*true/i,
  /verified_badge/i,
  /aria-label="Verified"/i,
];

/**
 * Tried in order; the first rule whose capture parses wins.
 */
export const FOLLOWER_RULES: readonly RegExp[] = [
  /"followersCount":\s*(\d+)/i,
  /(\d[\d,]+)\s+people\s+follow\s+this/i,
  /([\d,]+)\s+followers/i,
];

const REACTION_LABEL_PATTERN =
  /aria-label="[^"]*(?:Like|Love|Wow|Haha|Sad|Angry)[^"]*"/gi;
const COMMENT_PATTERN = /comments?/gi;

export const PROFILE_PHOTO_MARKERS: readonly RegExp[] = [
  /profile_pic/i,
  /profile.*picture/i,
];

export const COVER_PHOTO_MARKERS: readonly RegExp[] = [
  /cover_photo/i,
  /cover.*image/i,
];

const BIO_BLOCK_PATTERN = /<div[^>]*?(?:about|bio)[^>]*>([\s\S]*?)<\/div>/i;
const TAG_PATTERN = /<[^>]+>/g;

export function defaultProfileSignals(username: string): ProfileSignals {
  return {
    username,
    is_verified: false,
    followers: DEFAULT_FOLLOWERS,
    posts_count: DEFAULT_POSTS_COUNT,
    engagement_rate: DEFAULT_ENGAGEMENT_RATE,
    bio_length: DEFAULT_BIO_LENGTH,
    has_profile_photo: true,
    has_cover_photo: true,
  };
}

/**
 * Divides, returning 0 for a zero (or non-finite) denominator.
 */
export function safeDivide(numerator: number, denominator: number): number {
  return denominator && Number.isFinite(denominator)
    ? numerator / denominator
    : 0;
}

/**
 * Parses a count such as `1,234,567`. Returns null when the digits do not
 * form a safe integer.
 */
export function parseCount(raw: string): number | null {
  const digits = raw.replace(/,/g, '');
  if (!/^\d+$/.test(digits)) {
    return null;
  }

  const value = Number(digits);
  return Number.isSafeInteger(value) ? value : null;
}

export function detectVerification(html: string): boolean {
  return VERIFICATION_MARKERS.some((marker) => marker.test(html));
}

export function matchFollowers(html: string): number | null {
  for (const rule of FOLLOWER_RULES) {
    const captured = rule.exec(html)?.[1];
    if (captured === undefined) {
      continue;
    }

    const count = parseCount(captured);
    if (count !== null) {
      return count;
    }
  }

  return null;
}

function countMatches(html: string, pattern: RegExp): number {
  return html.match(pattern)?.length ?? 0;
}

export function computeEngagementRate(html: string, postsCount: number): number {
  const interactions =
    countMatches(html, REACTION_LABEL_PATTERN) +
    countMatches(html, COMMENT_PATTERN);

  return Math.min(safeDivide(interactions, postsCount * 3), MAX_ENGAGEMENT_RATE);
}

/**
 * A marker confirms the photo; missing markup keeps the fallback.
 */
export function detectPresence(
  html: string,
  markers: readonly RegExp[],
  fallback: boolean,
): boolean {
  return markers.some((marker) => marker.test(html)) || fallback;
}

export function measureBio(html: string): number | null {
  const block = BIO_BLOCK_PATTERN.exec(html);
  if (!block) {
    return null;
  }

  const text = (block[1] ?? '').replace(TAG_PATTERN, '').trim();
  return Array.from(text).length;
}

/**
 * Converts a profile page into {@link ProfileSignals}.
 *
 * Each rule runs in isolation: a rule that throws leaves its own field at the
 * default and the others still apply. The function never throws.
 */
export function extractProfileSignals(
  html: string,
  username: string,
  options: ExtractionOptions = {},
): ProfileSignals {
  const defaults = defaultProfileSignals(username);

  if (typeof html !== 'string' || html.length === 0) {
    return defaults;
  }

  const attempt = <T>(signal: SignalName, fallback: T, read: () => T): T => {
    try {
      return read();
    } catch (error) {
      options.onSignalError?.(signal, error);
      return fallback;
    }
  };

  try {
    const postsCount = defaults.posts_count;

    return {
      username,
      is_verified: attempt('is_verified', defaults.is_verified, () =>
        detectVerification(html),
      ),
      followers: attempt(
        'followers',
        defaults.followers,
        () => matchFollowers(html) ?? defaults.followers,
      ),
      posts_count: postsCount,
      engagement_rate: attempt('engagement_rate', defaults.engagement_rate, () =>
        computeEngagementRate(html, postsCount),
      ),
      bio_length: attempt(
        'bio_length',
        defaults.bio_length,
        () => measureBio(html) ?? defaults.bio_length,
      ),
      has_profile_photo: attempt(
        'has_profile_photo',
        defaults.has_profile_photo,
        () => detectPresence(html, PROFILE_PHOTO_MARKERS, defaults.has_profile_photo),
      ),
      has_cover_photo: attempt(
        'has_cover_photo',
        defaults.has_cover_photo,
        () => detectPresence(html, COVER_PHOTO_MARKERS, defaults.has_cover_photo),
      ),
    };
  } catch {
    // a throwing onSignalError hook yields the full default record
    return defaults;
  }
}
