import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { boundedNumber } from '../config.utils';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

@Injectable()
export class FacebookConfigService {
  constructor(private readonly config: ConfigService) {}

  public get baseUrl(): string {
    return this.config.get<string>(
      'facebook.baseUrl',
      'https://www.facebook.com',
    );
  }

  public get cookiePath(): string {
    return this.config.get<string>(
      'facebook.cookiePath',
      'cookies/facebook_cookies.json',
    );
  }

  public get timeout(): number {
    return boundedNumber(this.config.get<number>('facebook.timeout'), 30000, 1);
  }

  public get userAgent(): string {
    return this.config.get<string>('facebook.userAgent', DEFAULT_USER_AGENT);
  }

  /**
   * Maximum number of profile pages fetched at once for one request.
   */
  public get concurrency(): number {
    return Math.floor(
      boundedNumber(this.config.get<number>('facebook.concurrency'), 3, 1),
    );
  }
}
