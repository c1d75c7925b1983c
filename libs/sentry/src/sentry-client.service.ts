import { Injectable } from '@nestjs/common';
import * as Sentry from '@sentry/nestjs';

import { AppConfigService } from '@libs/config';

@Injectable()
export class SentryClientService {
  constructor(private readonly config: AppConfigService) {}

  /**
   * Reports an error to Sentry (production only).
   *
   * @param error - The error to report.
   * @param extra - Context attached to the event, such as the profile or callback URL.
   */
  public sendException(error: unknown, extra?: Record<string, unknown>): void {
    if (this.config.isProd) {
      Sentry.captureException(error, { extra });
    }
  }

  /**
   * Reports a non-fatal condition, such as an exhausted callback delivery,
   * as a warning-level message (production only).
   */
  public sendWarning(message: string, extra?: Record<string, unknown>): void {
    if (this.config.isProd) {
      Sentry.captureMessage(message, { level: 'warning', extra });
    }
  }
}
