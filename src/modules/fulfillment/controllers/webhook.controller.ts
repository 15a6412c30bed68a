import {
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Inject,
  InternalServerErrorException,
  Logger,
  Post,
  UnauthorizedException,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { IncomingHttpHeaders } from 'http';
import { ProcessingResult, ProcessingStatus, WebhookProcessor } from '../../../core';
import { ApiPaymentWebhook, WebhookResponseDto } from '../../../_shared';
import { RawBodyInterceptor } from '../interceptors/raw-body.interceptor';
import { BodySizeGuard } from '../middleware/body-size.guard';
import { WEBHOOK_PROCESSOR } from '../constants';

const STATUS_MESSAGES: Record<ProcessingStatus, string> = {
  [ProcessingStatus.PROCESSED]: 'Webhook processed successfully',
  [ProcessingStatus.DUPLICATE]: 'Event already processed',
  [ProcessingStatus.STALE]: 'Order already moved past this event',
  [ProcessingStatus.SIGNATURE_FAILED]: 'Invalid webhook signature',
  [ProcessingStatus.NORMALIZATION_FAILED]: 'Payload could not be interpreted',
  [ProcessingStatus.UNMATCHED]: 'No matching order',
  [ProcessingStatus.AMOUNT_MISMATCH]: 'Amount or currency does not match the order',
  [ProcessingStatus.TRANSITION_REJECTED]: 'Event not applicable to the order',
  [ProcessingStatus.INTERNAL_ERROR]: 'Webhook processing failed',
};

/**
 * Webhook Controller
 *
 * The payment provider POSTs payment outcomes here. Signature, admission and
 * the state transition are handled before responding; fulfillment is queued.
 */
@ApiTags('Ingest')
@Controller('webhooks')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(
    @Inject(WEBHOOK_PROCESSOR)
    private readonly webhookProcessor: WebhookProcessor,
  ) {}

  @Post('payment')
  @HttpCode(HttpStatus.OK)
  @UseGuards(BodySizeGuard)
  @UseInterceptors(RawBodyInterceptor)
  @ApiPaymentWebhook()
  async handlePaymentWebhook(
    @Body() rawBody: Buffer,
    @Headers() headers: IncomingHttpHeaders,
  ): Promise<WebhookResponseDto> {
    const result = await this.webhookProcessor.processWebhook(rawBody, headers);
    const response = this.formatResponse(result);

    switch (result.processingStatus) {
      case ProcessingStatus.SIGNATURE_FAILED:
        throw new UnauthorizedException(response);
      case ProcessingStatus.INTERNAL_ERROR:
        this.logger.error(`Webhook ${result.context.processingId} failed: ${result.error?.message}`);
        throw new InternalServerErrorException(response);
      default:
        return response;
    }
  }

  private formatResponse(result: ProcessingResult): WebhookResponseDto {
    const response: WebhookResponseDto = {
      processingStatus: result.processingStatus,
      message: STATUS_MESSAGES[result.processingStatus],
    };
    if (result.orderId) {
      response.orderId = result.orderId;
    }
    return response;
  }
}
