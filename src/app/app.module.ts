import { Module } from '@nestjs/common';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { SentryGlobalFilter, SentryModule } from '@sentry/nestjs/setup';

import { AppConfigModule } from '@libs/config';
import { SentryClientModule } from '@libs/sentry';

import { AppController } from './app.controller';
import { CallbackModule } from '../callback';
import { FacebookModule } from '../facebook';
import { MetricsModule, MetricsInterceptor } from '../metrics';

@Module({
  imports: [
    AppConfigModule,
    CallbackModule,
    EventEmitterModule.forRoot(),
    FacebookModule,
    MetricsModule,
    SentryClientModule,
    SentryModule.forRoot(),
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_FILTER,
      useClass: SentryGlobalFilter,
    },
    {
      provide: APP_INTERCEPTOR,
      useClass: MetricsInterceptor,
    },
  ],
})
export class AppModule {}
