import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { boundedNumber } from '../config.utils';

@Injectable()
export class CallbackConfigService {
  constructor(private readonly config: ConfigService) {}

  public get timeout(): number {
    return boundedNumber(this.config.get<number>('callback.timeout'), 10000, 1);
  }

  public get maxAttempts(): number {
    return Math.floor(
      boundedNumber(this.config.get<number>('callback.maxAttempts'), 3, 1),
    );
  }

  /**
   * Delay before the second attempt; each later attempt waits one more multiple.
   */
  public get baseDelay(): number {
    return boundedNumber(this.config.get<number>('callback.baseDelay'), 1000, 0);
  }
}
