import { Module } from '@nestjs/common';

import { CallbackConfigModule } from '@libs/config';

import { MetricsModule } from '../metrics';
import { CallbackListener } from './callback.listener';
import { CallbackService } from './callback.service';

@Module({
  imports: [CallbackConfigModule, MetricsModule],
  providers: [CallbackService, CallbackListener],
  exports: [CallbackService],
})
export class CallbackModule {}
