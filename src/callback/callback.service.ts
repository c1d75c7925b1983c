import { Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';

import { CallbackConfigService } from '@libs/config';
import { SentryClientService } from '@libs/sentry';
import { sleep } from '@libs/utils';

import { MetricsService } from '../metrics';

/**
 * Linear backoff: the wait after attempt `n` is `n` times the base delay.
 */
export function backoffDelay(baseDelay: number, attempt: number): number {
  return baseDelay * attempt;
}

@Injectable()
export class CallbackService {
  private readonly logger = new Logger(CallbackService.name);
  private readonly httpClient: AxiosInstance;

  constructor(
    private readonly callbackConfig: CallbackConfigService,
    private readonly sentry: SentryClientService,
    private readonly metricsService: MetricsService,
  ) {
    this.httpClient = axios.create({
      timeout: this.callbackConfig.timeout,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  /**
   * Posts a payload to a callback URL, retrying failed attempts with linear
   * backoff. Never throws.
   *
   * @returns Whether any attempt got a 2xx response.
   */
  public async deliver(url: string, payload: object): Promise<boolean> {
    const maxAttempts = this.callbackConfig.maxAttempts;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await this.httpClient.post(url, payload);

        this.logger.log(`Callback delivered to ${url} (attempt ${attempt})`);
        this.metricsService.recordCallbackDelivery('delivered', attempt);
        return true;
      } catch (error) {
        this.logger.warn(
          `Callback attempt ${attempt}/${maxAttempts} to ${url} failed: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );

        if (attempt < maxAttempts) {
          await sleep(backoffDelay(this.callbackConfig.baseDelay, attempt));
        }
      }
    }

    this.logger.error(
      `Callback to ${url} failed after ${maxAttempts} attempts`,
    );
    this.metricsService.recordCallbackDelivery('failed', maxAttempts);
    this.sentry.sendWarning('Callback delivery exhausted', {
      url,
      attempts: maxAttempts,
    });
    return false;
  }
}
