import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse } from '@nestjs/swagger';
import {
  AffiliateSummaryResponseDto,
  OrderCreatedResponseDto,
  RefundResolutionResponseDto,
} from '../../dto/order.dto';

const orderIdParam = () =>
  ApiParam({
    name: 'orderId',
    description: 'Order identifier',
    example: 'ORD_1760000000_1A2B3C4D',
  });

export const ApiCreateOrder = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Create an order awaiting payment',
      description: 'Price and currency come from the product catalog.',
    }),
    ApiResponse({ status: 201, type: OrderCreatedResponseDto }),
    ApiResponse({ status: 400, description: 'Invalid request or unknown product kind' }),
  );
};

export const ApiGetOrderStatus = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Order status snapshot',
      description: 'The generated report is included once the order is completed.',
    }),
    orderIdParam(),
    ApiResponse({ status: 200, description: 'Current order state' }),
    ApiResponse({ status: 404, description: 'Order not found' }),
  );
};

export const ApiResolveRefund = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Confirm a manual refund',
      description: 'Moves a failed order whose refund awaits an operator to refunded.',
    }),
    orderIdParam(),
    ApiResponse({ status: 200, type: RefundResolutionResponseDto }),
    ApiResponse({ status: 404, description: 'Order not found' }),
    ApiResponse({ status: 409, description: 'Order has no refund awaiting an operator' }),
  );
};

export const ApiAffiliateSummary = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Ledger totals for an affiliate' }),
    ApiParam({ name: 'code', example: 'AFF01' }),
    ApiResponse({ status: 200, type: AffiliateSummaryResponseDto }),
  );
};
