import { Module } from '@nestjs/common';
import { OrdersV1Module } from './orders-v1.module';
import { OrdersV2Module } from './orders-v2.module';

/**
 * Orders Module
 *
 * The V1 and V2 controllers share the same routes; the version selected by
 * ApiVersionMiddleware decides which one handles a request. Each version lives
 * in its own module so the API documents can be built per version.
 */
@Module({
  imports: [OrdersV1Module, OrdersV2Module],
})
export class OrdersModule {}
