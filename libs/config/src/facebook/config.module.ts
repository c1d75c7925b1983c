import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { FacebookConfigService } from './config.service';
import facebookConfiguration from './configuration';

@Module({
  imports: [
    ConfigModule.forRoot({
      cache: true,
      load: [facebookConfiguration],
    }),
  ],
  providers: [FacebookConfigService],
  exports: [FacebookConfigService],
})
export class FacebookConfigModule {}
