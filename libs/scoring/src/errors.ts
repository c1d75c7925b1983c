/**
 * Raised when aggregation is asked to combine zero profile results.
 */
export class EmptyInputError extends Error {
  constructor(message = 'Cannot aggregate an empty set of profile scores') {
    super(message);
    this.name = 'EmptyInputError';
  }
}
