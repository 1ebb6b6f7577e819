import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import type { RequestContext } from '../../common/context/request-context';
import { API_VERSIONS, type ApiVersion } from '../../common/versioning/versioned-resources';
import { OrderResponseDto } from '../dto/order-response.dto';

const HOUR_MS = 60 * 60 * 1000;

interface OrderLifecycle {
  /** Status of a freshly placed order */
  placed: string;
  /** Status reported by lookups */
  fulfilled: string;
  /** How long ago a looked-up order claims to have been created */
  fulfilledAgeMs: number;
}

const LIFECYCLE_BY_VERSION: Record<ApiVersion, OrderLifecycle> = {
  [API_VERSIONS.V1]: { placed: 'Pending', fulfilled: 'Completed', fulfilledAgeMs: 2 * HOUR_MS },
  [API_VERSIONS.V2]: { placed: 'Pending Shipment', fulfilled: 'Shipped', fulfilledAgeMs: 24 * HOUR_MS },
};

/**
 * Mock order processing. Nothing is stored; lookups synthesize an order.
 */
@Injectable()
export class OrdersService {
  place(version: ApiVersion, context: RequestContext, summary: Record<string, unknown>): OrderResponseDto {
    const order: OrderResponseDto = {
      orderId: randomUUID(),
      status: LIFECYCLE_BY_VERSION[version].placed,
      createdAt: new Date().toISOString(),
      apiVersion: version,
    };

    context.getLogger(OrdersService.name).log(`Creating order V${version}`, {
      orderId: order.orderId,
      ...summary,
    });

    return order;
  }

  find(id: string, version: ApiVersion, context: RequestContext): OrderResponseDto {
    const lifecycle = LIFECYCLE_BY_VERSION[version];

    context.getLogger(OrdersService.name).log(`Retrieving order V${version}`, { orderId: id });

    return {
      orderId: id,
      status: lifecycle.fulfilled,
      createdAt: new Date(Date.now() - lifecycle.fulfilledAgeMs).toISOString(),
      apiVersion: version,
    };
  }
}
