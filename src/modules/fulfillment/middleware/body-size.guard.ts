import {
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Inject,
  Injectable,
} from '@nestjs/common';
import { Request } from 'express';
import { FULFILLMENT_CONFIG } from '../constants';
import { FulfillmentModuleConfig, resolveWebhookSettings } from '../fulfillment.config';

/**
 * Webhook Body Size Guard
 *
 * Answers 413 when the declared or received body exceeds `webhooks.maxBodyBytes`.
 *
 * Usage:
 * @UseGuards(BodySizeGuard)
 */
@Injectable()
export class BodySizeGuard implements CanActivate {
  private readonly maxBodyBytes: number;

  constructor(@Inject(FULFILLMENT_CONFIG) config: FulfillmentModuleConfig) {
    this.maxBodyBytes = resolveWebhookSettings(config).maxBodyBytes;
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();

    const contentLength = request.headers['content-length'];
    if (contentLength) {
      const size = parseInt(contentLength, 10);
      if (!isNaN(size)) {
        this.assertWithinLimit(size);
      }
    }

    const body: unknown = request.body;
    if (Buffer.isBuffer(body)) {
      this.assertWithinLimit(body.length);
    } else if (typeof body === 'string') {
      this.assertWithinLimit(Buffer.byteLength(body));
    }

    return true;
  }

  isValidSize(size: number): boolean {
    return size <= this.maxBodyBytes;
  }

  private assertWithinLimit(size: number): void {
    if (this.isValidSize(size)) {
      return;
    }
    throw new HttpException(
      {
        statusCode: HttpStatus.PAYLOAD_TOO_LARGE,
        message: `Payload too large. Maximum size is ${this.maxBodyBytes} bytes.`,
        error: 'Payload Too Large',
        maxSize: this.maxBodyBytes,
        actualSize: size,
      },
      HttpStatus.PAYLOAD_TOO_LARGE,
    );
  }
}
