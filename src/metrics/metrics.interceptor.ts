import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

import { MetricsService } from './metrics.service';

@Injectable()
export class MetricsInterceptor<T> implements NestInterceptor<T, T> {
  constructor(private readonly metricsService: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler<T>): Observable<T> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const routePath = request.route?.path ?? request.path;

    const startTime = Date.now();
    const record = (statusCode: number) =>
      this.metricsService.recordHttpRequest(
        request.method,
        String(routePath),
        statusCode,
        (Date.now() - startTime) / 1000,
      );

    return next.handle().pipe(
      tap({
        next: () => record(response.statusCode || 200),
        error: (error: unknown) =>
          record(error instanceof HttpException ? error.getStatus() : 500),
      }),
    );
  }
}
