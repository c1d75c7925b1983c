export const SCORE_COMPLETED_EVENT = 'score.completed';

/**
 * Emitted once per finished aggregation that asked for a callback.
 */
export class ScoreCompletedEvent<T extends object = object> {
  constructor(
    public readonly callbackUrl: string,
    public readonly payload: T,
  ) {}
}
