import {
  computeEngagementRate,
  defaultProfileSignals,
  detectPresence,
  extractProfileSignals,
  matchFollowers,
  measureBio,
  parseCount,
  safeDivide,
  VERIFICATION_MARKERS,
} from './profile-extractor';

describe('extractProfileSignals', () => {
  it('returns every default for an empty document', () => {
    expect(extractProfileSignals('', 'jane.doe')).toEqual({
      username: 'jane.doe',
      is_verified: false,
      followers: 10000,
      posts_count: 10,
      engagement_rate: 0,
      bio_length: 100,
      has_profile_photo: true,
      has_cover_photo: true,
    });
  });

  it('returns defaults for markup without any known marker', () => {
    const html = '<html><body><h1>Nothing to see</h1></body></html>';

    expect(extractProfileSignals(html, 'plain')).toEqual(
      defaultProfileSignals('plain'),
    );
  });

  it('reads a structured follower count and a verification badge', () => {
    const html =
      '<script>{"followersCount": 2500000}</script><span class="verified_badge"></span>';

    expect(extractProfileSignals(html, 'star')).toEqual({
      username: 'star',
      is_verified: true,
      followers: 2500000,
      posts_count: 10,
      engagement_rate: 0,
      bio_length: 100,
      has_profile_photo: true,
      has_cover_photo: true,
    });
  });

  it.each([
    ['"is_verified": true'],
    ['"IS_VERIFIED":true'],
    ['<i aria-label="Verified"></i>'],
  ])('detects verification from %s', (marker) => {
    expect(extractProfileSignals(marker, 'v').is_verified).toBe(true);
  });

  it('keeps the identifier unchanged', () => {
    expect(extractProfileSignals('', '  Odd Name!  ').username).toBe(
      '  Odd Name!  ',
    );
  });

  it('keeps photo flags when the page only shows other people\'s avatars', () => {
    const html =
      '<div class="comment"><img class="silhouette" alt="Commenter"/></div><div>Add cover photo</div>';
    const signals = extractProfileSignals(html, 'x');

    expect(signals.has_profile_photo).toBe(true);
    expect(signals.has_cover_photo).toBe(true);
  });

  it('detects photo markers', () => {
    const html = '<img class="profile_pic" /><img class="cover_photo" />';
    const signals = extractProfileSignals(html, 'both');

    expect(signals.has_profile_photo).toBe(true);
    expect(signals.has_cover_photo).toBe(true);
  });

  it('is deterministic for the same input', () => {
    const html =
      '<div class="bio">Runner</div> 3,400 followers <span aria-label="Love"></span>';

    expect(extractProfileSignals(html, 'a')).toEqual(
      extractProfileSignals(html, 'a'),
    );
  });

  it('does not throw on truncated markup', () => {
    const html = '<div class="about"><span>unfinished "followersCount": ';

    expect(() => extractProfileSignals(html, 'broken')).not.toThrow();
    expect(extractProfileSignals(html, 'broken').bio_length).toBe(100);
  });
});

describe('matchFollowers', () => {
  it('uses the first rule that matches', () => {
    const html = '1,234 people follow this page. 99 followers';

    expect(matchFollowers(html)).toBe(1234);
  });

  it('prefers the structured count over text forms', () => {
    const html = '12 followers {"followersCount": 777}';

    expect(matchFollowers(html)).toBe(777);
  });

  it('moves to the next rule when a capture does not parse', () => {
    const html = '99999999999999999999 people follow this, and 5,000 followers';

    expect(matchFollowers(html)).toBe(5000);
  });

  it('returns null when the only capture is separators', () => {
    expect(matchFollowers('Top , followers list')).toBeNull();
  });

  it('leaves the default in place when nothing parses', () => {
    expect(extractProfileSignals('Top , followers list', 'x').followers).toBe(
      10000,
    );
  });
});

describe('parseCount', () => {
  it('removes thousands separators', () => {
    expect(parseCount('12,345,678')).toBe(12345678);
  });

  it('rejects empty digit strings', () => {
    expect(parseCount(',,')).toBeNull();
  });

  it('rejects values beyond the safe integer range', () => {
    expect(parseCount('9007199254740993')).toBeNull();
  });
});

describe('computeEngagementRate', () => {
  it('counts reaction labels and comment mentions per three posts', () => {
    const html = [
      '<span aria-label="Like: 12 people"></span>',
      '<span aria-label="Love"></span>',
      '<span aria-label="Haha reaction"></span>',
      '<a>2 comments</a>',
      '<a>Write a comment</a>',
    ].join('');

    expect(computeEngagementRate(html, 10)).toBeCloseTo(5 / 30, 10);
  });

  it('caps the rate at 0.9', () => {
    expect(computeEngagementRate('comment '.repeat(40), 10)).toBe(0.9);
  });

  it('returns zero when there are no posts', () => {
    expect(computeEngagementRate('comment', 0)).toBe(0);
  });
});

describe('safeDivide', () => {
  it('returns zero for a zero denominator', () => {
    expect(safeDivide(5, 0)).toBe(0);
  });

  it('divides otherwise', () => {
    expect(safeDivide(3, 4)).toBe(0.75);
  });
});

describe('measureBio', () => {
  it('strips nested tags and trims whitespace', () => {
    expect(
      measureBio('<div class="bio-section">  <span>Hello</span> world  </div>'),
    ).toBe(11);
  });

  it('captures across lines', () => {
    const html = '<div id="about">\n<p>Line one</p>\n<p>Line two</p>\n</div>';

    expect(measureBio(html)).toBe(17);
  });

  it('stops at the first closing tag', () => {
    expect(measureBio('<div class="about"><div>inner</div> tail</div>')).toBe(5);
  });

  it('counts characters rather than code units', () => {
    expect(measureBio('<div class="BIO">👋 hi</div>')).toBe(4);
  });

  it('returns null without a bio block', () => {
    expect(measureBio('<div class="header">Hello</div>')).toBeNull();
  });
});

describe('detectPresence', () => {
  it('returns the fallback when no marker matches', () => {
    expect(detectPresence('<p></p>', [/cover_photo/], true)).toBe(true);
    expect(detectPresence('<p></p>', [/cover_photo/], false)).toBe(false);
    expect(detectPresence('cover_photo', [/cover_photo/], false)).toBe(true);
  });
});

describe('extractProfileSignals with a failing rule', () => {
  const html =
    '<script>{"followersCount": 2500000}</script><span class="verified_badge"></span>';
  const failure = new Error('rule failed');

  beforeEach(() => {
    jest.spyOn(VERIFICATION_MARKERS[0], 'test').mockImplementation(() => {
      throw failure;
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('defaults only the failing signal and reports it', () => {
    const onSignalError = jest.fn();

    const signals = extractProfileSignals(html, 'star', { onSignalError });

    expect(signals.is_verified).toBe(false);
    expect(signals.followers).toBe(2500000);
    expect(onSignalError).toHaveBeenCalledTimes(1);
    expect(onSignalError).toHaveBeenCalledWith('is_verified', failure);
  });

  it('returns the default record when the error hook throws', () => {
    const signals = extractProfileSignals(html, 'star', {
      onSignalError: () => {
        throw new Error('hook failed');
      },
    });

    expect(signals).toEqual(defaultProfileSignals('star'));
  });
});
