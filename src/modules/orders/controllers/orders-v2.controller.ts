import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Res,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { RequestContext } from '../../common/context/request-context';
import { ReqContext } from '../../common/decorators/request-context.decorator';
import { API_VERSIONS, versionedPaths } from '../../common/versioning/versioned-resources';
import { CreateOrderV2Dto } from '../dto/create-order-v2.dto';
import { OrderResponseDto } from '../dto/order-response.dto';
import { OrdersService } from '../services/orders.service';

/**
 * Orders V2: served at /v2/orders, or /orders with X-Version: 2.0
 *
 * Breaking changes from V1: customer by ID, product by SKU, shipping address.
 */
@ApiTags('Orders V2')
@ApiHeader({ name: 'X-Version', required: false, description: '2.0' })
@Controller({ path: versionedPaths('orders'), version: API_VERSIONS.V2 })
export class OrdersV2Controller {
  constructor(private readonly ordersService: OrdersService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create an order (V2)' })
  @ApiResponse({ status: 201, type: OrderResponseDto })
  @ApiResponse({ status: 400, description: 'Validation failed' })
  create(
    @Body() dto: CreateOrderV2Dto,
    @ReqContext() context: RequestContext,
    @Res({ passthrough: true }) res: Response,
  ): OrderResponseDto {
    const order = this.ordersService.place(API_VERSIONS.V2, context, {
      customerId: dto.customerId,
      productSKU: dto.productSKU,
      quantity: dto.quantity,
    });
    res.location(`/v2/orders/${order.orderId}`);
    return order;
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an order (V2)' })
  @ApiResponse({ status: 200, type: OrderResponseDto })
  getById(
    @Param('id', new ParseUUIDPipe()) id: string,
    @ReqContext() context: RequestContext,
  ): OrderResponseDto {
    return this.ordersService.find(id, API_VERSIONS.V2, context);
  }
}
