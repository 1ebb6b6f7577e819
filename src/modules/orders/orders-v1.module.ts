import { Module } from '@nestjs/common';
import { OrdersV1Controller } from './controllers/orders-v1.controller';
import { OrdersService } from './services/orders.service';

/**
 * Orders API version 1.0 (own module so it gets its own API document)
 */
@Module({
  controllers: [OrdersV1Controller],
  providers: [OrdersService],
})
export class OrdersV1Module {}
