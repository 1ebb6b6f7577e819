import { Module } from '@nestjs/common';
import { OrdersV2Controller } from './controllers/orders-v2.controller';
import { OrdersService } from './services/orders.service';

@Module({
  controllers: [OrdersV2Controller],
  providers: [OrdersService],
})
export class OrdersV2Module {}
