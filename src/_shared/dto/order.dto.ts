import {
  IsBoolean,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Length,
  Matches,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { OrderStatus, RefundStatus } from '../../core/domain/enums';

/**
 * DTO for creating a new order
 */
export class CreateOrderRequestDto {
  @ApiProperty({
    description: 'Chat or account the report is delivered to',
    example: '123456789',
  })
  @IsNotEmpty()
  @IsString()
  @Length(1, 255)
  userId!: string;

  @ApiProperty({
    description: 'Product kind from the catalog; price is taken from the catalog',
    example: 'basic_report',
  })
  @IsNotEmpty()
  @IsString()
  productKind!: string;

  @ApiProperty({
    description: 'Product input passed to enrichment and generation',
    example: { topic: 'quarterly summary' },
  })
  @IsObject()
  input!: Record<string, unknown>;

  @ApiPropertyOptional({
    description: 'Affiliate credited once the order completes',
    example: 'AFF01',
  })
  @IsOptional()
  @IsString()
  @Matches(/^[A-Za-z0-9_-]{1,64}$/, {
    message: 'affiliateCode may contain letters, digits, "_" and "-" only',
  })
  affiliateCode?: string;
}

export class OrderCreatedResponseDto {
  @ApiProperty({ example: 'ORD_1760000000_1A2B3C4D' })
  orderId!: string;

  @ApiProperty({ enum: OrderStatus, example: OrderStatus.PENDING_PAYMENT })
  status!: OrderStatus;

  @ApiProperty({ description: 'Amount in minor units', example: 50000 })
  amount!: number;

  @ApiProperty({ example: 'NGN' })
  currency!: string;

  @ApiProperty({
    description: 'Merchant reference to put in the checkout link',
    example: 'ORD_1760000000_1A2B3C4D',
  })
  paymentReference!: string;
}

export class OrderStatusQueryDto {
  @ApiPropertyOptional({
    description: 'Include the complete audit trail',
    default: false,
  })
  @IsOptional()
  @Transform(({ value }) => value === true || value === 'true')
  @IsBoolean()
  includeAuditTrail?: boolean;
}

/**
 * DTO for an operator confirming an out-of-band refund
 */
export class ResolveRefundDto {
  @ApiProperty({
    description: 'Operator confirming the refund',
    example: 'ops@example.com',
  })
  @IsNotEmpty()
  @IsString()
  operator!: string;

  @ApiPropertyOptional({
    description: 'Reference of the refund made outside the provider API',
    example: 'manual_ref_001',
  })
  @IsOptional()
  @IsString()
  refundReference?: string;
}

export class RefundResolutionResponseDto {
  @ApiProperty({ example: 'ORD_1760000000_1A2B3C4D' })
  orderId!: string;

  @ApiProperty({ enum: OrderStatus, example: OrderStatus.REFUNDED })
  status!: OrderStatus;

  @ApiProperty({ enum: RefundStatus, example: RefundStatus.COMPLETED })
  refundStatus!: RefundStatus;
}

export class AffiliateSummaryResponseDto {
  @ApiProperty({ example: 'AFF01' })
  affiliateCode!: string;

  @ApiProperty({ description: 'Sum of credited order amounts, minor units', example: 150000 })
  totalSales!: number;

  @ApiProperty({ description: 'Minor units', example: 30000 })
  totalCommission!: number;

  @ApiProperty({ description: 'Minor units', example: 0 })
  totalBonus!: number;

  @ApiProperty({ example: 3 })
  entryCount!: number;
}
