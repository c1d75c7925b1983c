import {
  buildProfilePaths,
  isCookieExpired,
  isLoginPage,
  isStoredCookie,
  isUnavailablePage,
  normalizeFacebookUsername,
  parseSetCookie,
  selectFacebookUsernames,
  toCookieHeader,
} from './facebook.utils';

describe('selectFacebookUsernames', () => {
  it('keeps facebook entries of social score requests in order', () => {
    const usernames = selectFacebookUsernames(
      [
        {
          type: 'SOCIAL_SCORE',
          data: [
            { social_media: 'facebook', username: 'alice' },
            { social_media: 'twitter', username: 'bob' },
            { social_media: ' Facebook ', username: 'carol' },
          ],
        },
        {
          type: 'BANK_SCORE',
          data: [{ social_media: 'facebook', username: 'dave' }],
        },
      ],
      'SOCIAL_SCORE',
      'facebook',
    );

    expect(usernames).toEqual(['alice', 'carol']);
  });

  it('returns nothing when no request matches', () => {
    expect(
      selectFacebookUsernames(
        [{ type: 'SOCIAL_SCORE', data: [] }],
        'SOCIAL_SCORE',
        'facebook',
      ),
    ).toEqual([]);
  });
});

describe('normalizeFacebookUsername', () => {
  it.each([
    ['alice.smith', 'alice.smith'],
    ['@alice', 'alice'],
    ['https://www.facebook.com/alice/', 'alice'],
    ['facebook.com/alice?ref=bookmarks', 'alice'],
    ['https://m.facebook.com/profile.php?id=100012345', '100012345'],
    ['alice).', 'alice'],
    ['  ', ''],
  ])('normalizes %p to %p', (input, expected) => {
    expect(normalizeFacebookUsername(input)).toBe(expected);
  });
});

describe('buildProfilePaths', () => {
  it('tries the vanity path before the numeric form', () => {
    expect(buildProfilePaths('https://facebook.com/alice')).toEqual([
      '/alice',
      '/profile.php?id=alice',
    ]);
  });

  it('returns no paths for blank input', () => {
    expect(buildProfilePaths('')).toEqual([]);
  });
});

describe('page classification', () => {
  it('detects unavailable content', () => {
    expect(isUnavailablePage("<h2>This content isn't available right now</h2>")).toBe(true);
    expect(isUnavailablePage('<h1>Alice</h1>')).toBe(false);
  });

  it('detects the login form', () => {
    expect(isLoginPage('<form method="post" id="login_form" action="/login">')).toBe(true);
    expect(isLoginPage('<div id="profile">Alice</div>')).toBe(false);
  });
});

describe('cookies', () => {
  it('accepts only objects with a name and a string value', () => {
    expect(isStoredCookie({ name: 'c_user', value: '1' })).toBe(true);
    expect(isStoredCookie({ name: '', value: '1' })).toBe(false);
    expect(isStoredCookie({ name: 'xs', value: 2 })).toBe(false);
    expect(isStoredCookie('c_user=1')).toBe(false);
    expect(isStoredCookie(null)).toBe(false);
  });

  it('treats session cookies as unexpired', () => {
    const now = 2_000_000_000_000;

    expect(isCookieExpired({ name: 'a', value: '1' }, now)).toBe(false);
    expect(isCookieExpired({ name: 'a', value: '1', expires: -1 }, now)).toBe(false);
    expect(isCookieExpired({ name: 'a', value: '1', expires: 1_999_999_999 }, now)).toBe(true);
    expect(isCookieExpired({ name: 'a', value: '1', expires: 2_000_000_001 }, now)).toBe(false);
  });

  it('joins cookies into a header', () => {
    expect(
      toCookieHeader([
        { name: 'c_user', value: '1' },
        { name: 'xs', value: 'test-token' },
      ]),
    ).toBe('c_user=1; xs=test-token');
  });

  it('parses Set-Cookie values', () => {
    expect(
      parseSetCookie([
        'xs=new-token; Path=/; HttpOnly',
        'fr=deleted; Path=/',
        'sb=1; Max-Age=0',
        'broken',
      ]),
    ).toEqual([
      { name: 'xs', value: 'new-token' },
      { name: 'fr', value: '' },
      { name: 'sb', value: '' },
    ]);
    expect(parseSetCookie('datr=abc')).toEqual([{ name: 'datr', value: 'abc' }]);
    expect(parseSetCookie(undefined)).toEqual([]);
  });
});
