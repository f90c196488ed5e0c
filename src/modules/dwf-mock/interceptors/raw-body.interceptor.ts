import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import type { Request } from 'express';
import { Observable } from 'rxjs';
import { toRawBody } from '../../../core';

/**
 * Raw Body Interceptor
 *
 * Hands the handler the request body as a Buffer whatever the content type,
 * so malformed JSON reaches the payload codec instead of the body parser
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    request.body = toRawBody(request.body);

    return next.handle();
  }
}
