import { Controller, Get, Inject, Param } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { OrderService } from '../../../core';
import { AffiliateSummaryResponseDto, ApiAffiliateSummary } from '../../../_shared';
import { ORDER_SERVICE } from '../constants';

@ApiTags('Affiliates')
@Controller('affiliates')
export class AffiliatesController {
  constructor(
    @Inject(ORDER_SERVICE)
    private readonly orderService: OrderService,
  ) {}

  @Get(':code/summary')
  @ApiAffiliateSummary()
  async getSummary(@Param('code') code: string): Promise<AffiliateSummaryResponseDto> {
    return this.orderService.getAffiliateSummary(code);
  }
}
