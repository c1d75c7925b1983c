import { Module } from '@nestjs/common';

import { FacebookConfigModule, ScoringConfigModule } from '@libs/config';

import { MetricsModule } from '../metrics';
import { FacebookController } from './facebook.controller';
import { FacebookPageFetcher } from './facebook-page.fetcher';
import { FacebookSessionService } from './facebook-session.service';
import { FacebookService } from './facebook.service';
import { PROFILE_PAGE_FETCHER } from './interfaces';

@Module({
  imports: [FacebookConfigModule, ScoringConfigModule, MetricsModule],
  controllers: [FacebookController],
  providers: [
    FacebookService,
    FacebookSessionService,
    {
      provide: PROFILE_PAGE_FETCHER,
      useClass: FacebookPageFetcher,
    },
  ],
  exports: [FacebookService],
})
export class FacebookModule {}
