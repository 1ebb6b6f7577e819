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
import { CreateOrderV1Dto } from '../dto/create-order-v1.dto';
import { OrderResponseDto } from '../dto/order-response.dto';
import { OrdersService } from '../services/orders.service';

/**
 * Orders V1: served at /v1/orders, or /orders without X-Version (default) or
 * with X-Version: 1.0
 */
@ApiTags('Orders V1')
@ApiHeader({ name: 'X-Version', required: false, description: '1.0' })
@Controller({ path: versionedPaths('orders'), version: API_VERSIONS.V1 })
export class OrdersV1Controller {
  constructor(private readonly ordersService: OrdersService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create an order (V1)' })
  @ApiResponse({ status: 201, type: OrderResponseDto })
  @ApiResponse({ status: 400, description: 'Validation failed' })
  create(
    @Body() dto: CreateOrderV1Dto,
    @ReqContext() context: RequestContext,
    @Res({ passthrough: true }) res: Response,
  ): OrderResponseDto {
    const order = this.ordersService.place(API_VERSIONS.V1, context, {
      customerName: dto.customerName,
      productName: dto.productName,
      quantity: dto.quantity,
    });
    res.location(`/v1/orders/${order.orderId}`);
    return order;
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an order (V1)' })
  @ApiResponse({ status: 200, type: OrderResponseDto })
  getById(
    @Param('id', new ParseUUIDPipe()) id: string,
    @ReqContext() context: RequestContext,
  ): OrderResponseDto {
    return this.ordersService.find(id, API_VERSIONS.V1, context);
  }
}
