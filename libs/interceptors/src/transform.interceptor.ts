import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable, map } from 'rxjs';

import { ApiResponse } from '@libs/interfaces';

const RAW_PATHS = new Set(['/metrics']);

const MESSAGES: Record<number, string> = {
  201: 'Created successfully',
};

@Injectable()
export class TransformInterceptor<T>
  implements NestInterceptor<T, ApiResponse<T> | T>
{
  public intercept(
    context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<ApiResponse<T> | T> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<Request>();

    // Prometheus scrapes plain text
    if (RAW_PATHS.has(request.path)) {
      return next.handle();
    }

    return next.handle().pipe(
      map((data) => {
        const statusCode = ctx.getResponse<Response>().statusCode;

        return {
          statusCode,
          message: MESSAGES[statusCode] ?? 'Success',
          data,
        };
      }),
    );
  }
}
