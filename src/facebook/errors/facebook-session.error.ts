/**
 * The stored session is missing or no longer authenticated.
 */
export class FacebookSessionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FacebookSessionError';
  }
}
