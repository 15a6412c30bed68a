import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  NotFoundException,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  FulfillmentOrchestrator,
  OrderService,
  OrderStatusView,
  UnknownProductError,
} from '../../../core';
import {
  ApiCreateOrder,
  ApiGetOrderStatus,
  ApiResolveRefund,
  CreateOrderRequestDto,
  OrderCreatedResponseDto,
  OrderStatusQueryDto,
  RefundResolutionResponseDto,
  ResolveRefundDto,
} from '../../../_shared';
import { FULFILLMENT_ORCHESTRATOR, ORDER_SERVICE } from '../constants';

/**
 * Order Controller
 *
 * Order creation for the front-end, status queries and operator refund resolution
 */
@ApiTags('Orders')
@Controller('orders')
export class OrdersController {
  constructor(
    @Inject(ORDER_SERVICE)
    private readonly orderService: OrderService,
    @Inject(FULFILLMENT_ORCHESTRATOR)
    private readonly orchestrator: FulfillmentOrchestrator,
  ) {}

  @Post()
  @ApiCreateOrder()
  async createOrder(@Body() dto: CreateOrderRequestDto): Promise<OrderCreatedResponseDto> {
    try {
      const order = await this.orderService.createOrder({
        userId: dto.userId,
        productKind: dto.productKind,
        input: dto.input,
        affiliateCode: dto.affiliateCode,
        createdBy: `user:${dto.userId}`,
      });

      return {
        orderId: order.id,
        status: order.status,
        amount: order.amount,
        currency: order.currency,
        paymentReference: order.id,
      };
    } catch (error) {
      if (error instanceof UnknownProductError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  @Get(':orderId')
  @ApiGetOrderStatus()
  async getOrderStatus(
    @Param('orderId') orderId: string,
    @Query() query: OrderStatusQueryDto,
  ): Promise<OrderStatusView> {
    const view = await this.orderService.getOrderStatus(orderId, {
      includeAuditTrail: query.includeAuditTrail === true,
    });
    if (!view) {
      throw new NotFoundException(`Order ${orderId} not found`);
    }
    return view;
  }

  @Post(':orderId/refund/resolve')
  @HttpCode(HttpStatus.OK)
  @ApiResolveRefund()
  async resolveRefund(
    @Param('orderId') orderId: string,
    @Body() dto: ResolveRefundDto,
  ): Promise<RefundResolutionResponseDto> {
    const outcome = await this.orchestrator.resolveManualRefund(
      orderId,
      dto.operator,
      dto.refundReference,
    );

    switch (outcome.kind) {
      case 'applied':
        return {
          orderId: outcome.order.id,
          status: outcome.order.status,
          refundStatus: outcome.order.refundStatus,
        };
      case 'not_found':
        throw new NotFoundException(`Order ${orderId} not found`);
      default:
        throw new ConflictException(outcome.reason);
    }
  }
}
