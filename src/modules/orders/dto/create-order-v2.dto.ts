import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsNotEmpty, IsString, IsUUID, Matches, Max, Min } from 'class-validator';
import { ORDER_V2_MAX_QUANTITY, ORDER_V2_SKU_PATTERN } from './order.constraints';

const QUANTITY_MESSAGE = `Quantity must be between 1 and ${ORDER_V2_MAX_QUANTITY}.`;

/**
 * V2 order payload: customer by ID, product by SKU, shipping address required
 */
export class CreateOrderV2Dto {
  @ApiProperty({ format: 'uuid', example: '3f2b8c1e-5d4a-4b6f-9c7e-2a1d0e9f8b7c' })
  @IsNotEmpty({ message: 'Customer ID is required in V2.' })
  @IsUUID('all', { message: 'Customer ID must be a valid GUID.' })
  customerId!: string;

  @ApiProperty({ example: 'KBD-1024', pattern: ORDER_V2_SKU_PATTERN.source })
  @IsNotEmpty({ message: 'Product SKU is required in V2.' })
  @IsString({ message: 'Product SKU must be a string.' })
  @Matches(ORDER_V2_SKU_PATTERN, { message: 'SKU must match format: ABC-1234' })
  productSKU!: string;

  @ApiProperty({ minimum: 1, maximum: ORDER_V2_MAX_QUANTITY, example: 25 })
  @IsInt({ message: QUANTITY_MESSAGE })
  @Min(1, { message: QUANTITY_MESSAGE })
  @Max(ORDER_V2_MAX_QUANTITY, { message: QUANTITY_MESSAGE })
  quantity!: number;

  @ApiProperty({ example: '1 Main Street, Springfield' })
  @IsNotEmpty({ message: 'The ShippingAddress field is required.' })
  @IsString({ message: 'Shipping address must be a string.' })
  shippingAddress!: string;
}
