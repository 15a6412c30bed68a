import {
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Length,
  MaxLength,
  Min,
  ValidateIf,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * Width of the processed-event key column
 */
export const EVENT_ID_MAX_LENGTH = 128;

export const PAYMENT_WEBHOOK_STATUSES = ['paid', 'failed', 'cancelled'] as const;
export type PaymentWebhookStatus = (typeof PAYMENT_WEBHOOK_STATUSES)[number];

/**
 * Body of a payment provider webhook, validated after the signature check
 */
export class PaymentWebhookPayloadDto {
  @ApiProperty({ description: 'Merchant order id', example: 'ORD_1700000000_1A2B3C4D' })
  @IsString()
  @IsNotEmpty()
  order_id!: string;

  @ApiProperty({ enum: PAYMENT_WEBHOOK_STATUSES, example: 'paid' })
  @IsIn(PAYMENT_WEBHOOK_STATUSES)
  status!: PaymentWebhookStatus;

  @ApiPropertyOptional({ description: 'Provider payment id; required for paid events unless payment_id is set' })
  @ValidateIf((payload: PaymentWebhookPayloadDto) => payload.status === 'paid' && !payload.payment_id)
  @IsString()
  @IsNotEmpty()
  payment_reference?: string;

  @ApiPropertyOptional({ description: 'Alias of payment_reference' })
  @IsOptional()
  @IsString()
  payment_id?: string;

  @ApiProperty({ description: 'Amount in major units', example: 29.99 })
  @IsNumber()
  @Min(0)
  amount!: number;

  @ApiProperty({ example: 'USD' })
  @IsString()
  @Length(3, 3)
  currency!: string;

  @ApiPropertyOptional({ description: 'Provider event id, used as the idempotency key' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(EVENT_ID_MAX_LENGTH)
  event_id?: string;

  @ApiPropertyOptional({ example: '2024-01-01T12:00:00Z' })
  @IsOptional()
  @IsString()
  timestamp?: string;

  @ApiPropertyOptional({ example: 'card' })
  @IsOptional()
  @IsString()
  payment_method?: string;

  @ApiPropertyOptional({ example: 'Card declined' })
  @IsOptional()
  @IsString()
  error_message?: string;
}

/**
 * Refund API response
 */
export class RefundResponseDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsOptional()
  @IsIn(['pending', 'success'])
  status?: 'pending' | 'success';
}
