import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { ProcessingStatus } from '../../core/domain/enums';

/**
 * Response DTO for webhook processing
 */
export class WebhookResponseDto {
  @ApiProperty({
    description: 'How the delivery was classified',
    enum: ProcessingStatus,
    example: ProcessingStatus.PROCESSED,
  })
  processingStatus!: ProcessingStatus;

  @ApiPropertyOptional({
    description: 'Order the event was matched to',
    example: 'ORD_1760000000_1A2B3C4D',
  })
  orderId?: string;

  @ApiProperty({
    description: 'Processing message',
    example: 'Webhook processed successfully',
  })
  message!: string;
}
