import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
  RawBodyRequest,
} from '@nestjs/common';
import { Request } from 'express';
import { Observable } from 'rxjs';

/**
 * Raw Body Interceptor
 *
 * Hands the webhook handler the bytes the provider signed. A body that was
 * already parsed cannot be verified, so it is replaced by an empty buffer.
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<RawBodyRequest<Request>>();

    if (request.rawBody) {
      request.body = request.rawBody;
    } else if (Buffer.isBuffer(request.body)) {
      request.rawBody = request.body;
    } else if (typeof request.body === 'string') {
      request.rawBody = Buffer.from(request.body);
      request.body = request.rawBody;
    } else {
      request.rawBody = Buffer.alloc(0);
      request.body = request.rawBody;
    }

    return next.handle();
  }
}
