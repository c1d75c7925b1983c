import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { CallbackConfigService } from './config.service';
import callbackConfiguration from './configuration';

@Module({
  imports: [
    ConfigModule.forRoot({
      cache: true,
      load: [callbackConfiguration],
    }),
  ],
  providers: [CallbackConfigService],
  exports: [CallbackConfigService],
})
export class CallbackConfigModule {}
