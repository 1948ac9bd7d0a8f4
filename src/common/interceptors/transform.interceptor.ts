import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import type { FastifyRequest } from 'fastify';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';

import { ApiResponse, createApiResponse } from '../utils/response.util';

export const API_PREFIX = 'api';

/**
 * Wraps successful responses of API routes as `{ success: true, data, timestamp }`.
 * Routes outside the prefix (metrics, docs) pass through untouched.
 */
@Injectable()
export class TransformInterceptor<T> implements NestInterceptor<T, T | ApiResponse<T>> {
  intercept(context: ExecutionContext, next: CallHandler<T>): Observable<T | ApiResponse<T>> {
    const request = context.switchToHttp().getRequest<FastifyRequest>();

    if (!request.url.startsWith(`/${API_PREFIX}`)) {
      return next.handle();
    }

    return next.handle().pipe(map((data: T) => createApiResponse(true, data)));
  }
}
