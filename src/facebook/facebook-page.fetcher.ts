import { Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance, AxiosResponse } from 'axios';

import { FacebookConfigService } from '@libs/config';
import { SentryClientService } from '@libs/sentry';

import { FetchOutcome, MetricsService } from '../metrics';
import { FacebookSessionError } from './errors';
import { FacebookSessionService } from './facebook-session.service';
import { FACEBOOK_NETWORK, ProfilePageFetcher } from './interfaces';
import { buildProfilePaths, isLoginPage, isUnavailablePage } from './utils';

@Injectable()
export class FacebookPageFetcher implements ProfilePageFetcher {
  private readonly logger = new Logger(FacebookPageFetcher.name);
  private readonly httpClient: AxiosInstance;

  constructor(
    private readonly facebookConfig: FacebookConfigService,
    private readonly session: FacebookSessionService,
    private readonly sentry: SentryClientService,
    private readonly metricsService: MetricsService,
  ) {
    this.httpClient = axios.create({
      baseURL: this.facebookConfig.baseUrl,
      timeout: this.facebookConfig.timeout,
      responseType: 'text',
      maxRedirects: 5,
      // statuses are inspected per candidate URL
      validateStatus: () => true,
      headers: {
        'User-Agent': this.facebookConfig.userAgent,
        Accept: 'text/html,application/xhtml+xml',
        'Accept-Language': 'en-US,en;q=0.9',
      },
    });
  }

  /**
   * Fetches a profile page, trying the vanity URL first and then the numeric
   * `profile.php?id=` form.
   *
   * @param identifier - Username, numeric id or profile URL.
   *
   * @returns The page HTML, or null when no candidate URL served the profile.
   */
  public async fetch(identifier: string): Promise<string | null> {
    const startTime = Date.now();

    try {
      const html = await this.fetchFirstAvailable(identifier);
      this.record(html === null ? 'not_found' : 'success', startTime);
      return html;
    } catch (error) {
      this.record('error', startTime);
      if (!(error instanceof FacebookSessionError)) {
        this.sentry.sendException(error, { identifier });
      }
      throw error;
    }
  }

  private async fetchFirstAvailable(identifier: string): Promise<string | null> {
    const cookie = await this.session.getCookieHeader();

    for (const path of buildProfilePaths(identifier)) {
      const response = await this.request(path, cookie);
      if (!response) {
        continue;
      }

      await this.session.updateFromSetCookie(response.headers['set-cookie']);

      if (response.status >= 400) {
        this.logger.warn(`Profile page ${path} returned ${response.status}`);
        continue;
      }

      const html = typeof response.data === 'string' ? response.data : '';

      if (isLoginPage(html)) {
        this.session.invalidate();
        throw new FacebookSessionError(
          'Facebook session expired: redirected to the login page',
        );
      }

      if (isUnavailablePage(html)) {
        this.logger.log(`Profile page ${path} is not available`);
        continue;
      }

      return html;
    }

    return null;
  }

  private async request(
    path: string,
    cookie: string,
  ): Promise<AxiosResponse<unknown> | null> {
    try {
      return await this.httpClient.get<unknown>(path, {
        headers: { Cookie: cookie },
      });
    } catch (error) {
      this.logger.warn(
        `Attempt failed for ${path}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }

  private record(outcome: FetchOutcome, startTime: number): void {
    this.metricsService.recordProfileFetch(
      FACEBOOK_NETWORK,
      outcome,
      (Date.now() - startTime) / 1000,
    );
  }
}
