import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { ScoringConfigService } from './config.service';
import scoringConfiguration from './configuration';

@Module({
  imports: [
    ConfigModule.forRoot({
      cache: true,
      load: [scoringConfiguration],
    }),
  ],
  providers: [ScoringConfigService],
  exports: [ScoringConfigService],
})
export class ScoringConfigModule {}
