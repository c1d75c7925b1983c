/**
 * Retrieves the HTML of a profile page through an authenticated session.
 */
export interface ProfilePageFetcher {
  /**
   * Resolves to the page markup, or null when the profile could not be
   * resolved after the fetcher's own retries. Rejects only when the session
   * itself is unusable.
   */
  fetch(identifier: string): Promise<string | null>;
}

export const PROFILE_PAGE_FETCHER = Symbol('PROFILE_PAGE_FETCHER');
