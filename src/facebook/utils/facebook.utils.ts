import { StoredCookie } from '../interfaces';

const TRAILING_PUNCTUATION_REGEX = /[)\]}>,.!?:;"'`]+$/g;
const UNAVAILABLE_PAGE_REGEX = /content isn['’]t available/i;
const LOGIN_PAGE_REGEX = /<form[^>]+id="login_form"|name="login"[^>]*type="submit"/i;

export interface ScoreRequestLike {
  type: string;
  data: { social_media: string; username: string }[];
}

/**
 * Picks the Facebook identifiers out of a central score request, in order.
 */
export function selectFacebookUsernames(
  requests: ScoreRequestLike[],
  requestType: string,
  network: string,
): string[] {
  return requests
    .filter((request) => request.type === requestType)
    .flatMap((request) => request.data)
    .filter((entry) => entry.social_media.trim().toLowerCase() === network)
    .map((entry) => entry.username);
}

/**
 * Normalizes profile input into the path segment used on facebook.com.
 *
 * Accepts a full profile URL (with or without scheme), a `profile.php?id=`
 * URL, `@username` or a bare username / numeric id.
 */
export function normalizeFacebookUsername(profileOrUrl: string): string {
  const trimmed = String(profileOrUrl ?? '')
    .trim()
    .replace(TRAILING_PUNCTUATION_REGEX, '');
  if (!trimmed) {
    return '';
  }

  if (/^https?:\/\//i.test(trimmed) || /facebook\.com/i.test(trimmed)) {
    const withScheme = /^https?:\/\//i.test(trimmed)
      ? trimmed
      : `https://${trimmed.replace(/^\/+/, '')}`;

    try {
      const url = new URL(withScheme);
      const host = url.hostname.toLowerCase();

      if (host === 'facebook.com' || host.endsWith('.facebook.com')) {
        const id = url.searchParams.get('id');
        if (url.pathname.startsWith('/profile.php') && id) {
          return id;
        }

        const [first] = url.pathname.split('/').filter(Boolean);
        if (first) {
          return first;
        }
      }
    } catch (error) {
      if (!(error instanceof TypeError)) {
        throw error;
      }
    }
  }

  return trimmed.replace(/^@+/, '').split(/[/?#\s]/)[0] ?? '';
}

/**
 * Candidate page paths, tried in order.
 */
export function buildProfilePaths(identifier: string): string[] {
  const username = encodeURIComponent(normalizeFacebookUsername(identifier));
  if (!username) {
    return [];
  }

  return [`/${username}`, `/profile.php?id=${username}`];
}

export function isUnavailablePage(html: string): boolean {
  return UNAVAILABLE_PAGE_REGEX.test(html);
}

export function isLoginPage(html: string): boolean {
  return LOGIN_PAGE_REGEX.test(html);
}

export function isStoredCookie(value: unknown): value is StoredCookie {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    'value' in value &&
    typeof value.name === 'string' &&
    value.name.length > 0 &&
    typeof value.value === 'string'
  );
}

export function isCookieExpired(cookie: StoredCookie, now = Date.now()): boolean {
  return (
    typeof cookie.expires === 'number' &&
    cookie.expires > 0 &&
    cookie.expires * 1000 <= now
  );
}

export function toCookieHeader(cookies: StoredCookie[]): string {
  return cookies.map(({ name, value }) => `${name}=${value}`).join('; ');
}

/**
 * Reads `name=value` pairs from Set-Cookie header values. A cookie being
 * cleared (value `deleted` or `Max-Age=0`) comes back with an empty value.
 */
export function parseSetCookie(header: unknown): { name: string; value: string }[] {
  const values = Array.isArray(header) ? header : [header];

  return values
    .filter((value): value is string => typeof value === 'string')
    .map((line) => {
      const [pair = '', ...attributes] = line.split(';');
      const separator = pair.indexOf('=');
      const name = pair.slice(0, separator).trim();
      const value = pair.slice(separator + 1).trim();
      const cleared =
        value === 'deleted' ||
        attributes.some((attr) => /^\s*max-age\s*=\s*0\s*$/i.test(attr));

      return { name: separator > 0 ? name : '', value: cleared ? '' : value };
    })
    .filter(({ name }) => name.length > 0);
}
