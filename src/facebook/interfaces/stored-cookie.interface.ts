/**
 * Cookie as persisted in the session jar by the login step.
 */
export interface StoredCookie {
  name: string;
  value: string;
  domain?: string;
  path?: string;
  /** Unix seconds; -1 or absent for session cookies */
  expires?: number;
}
