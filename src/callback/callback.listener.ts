import { Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';

import { CallbackService } from './callback.service';
import { SCORE_COMPLETED_EVENT, ScoreCompletedEvent } from './events';

@Injectable()
export class CallbackListener {
  constructor(private readonly callbackService: CallbackService) {}

  /**
   * Delivers a finished score in the background; the HTTP response has
   * already been sent by the time this runs.
   */
  @OnEvent(SCORE_COMPLETED_EVENT, { async: true, promisify: true })
  public async handleScoreCompleted(event: ScoreCompletedEvent): Promise<void> {
    await this.callbackService.deliver(event.callbackUrl, event.payload);
  }
}
