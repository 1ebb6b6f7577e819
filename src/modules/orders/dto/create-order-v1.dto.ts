import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsNotEmpty, IsString, Length, Max, Min } from 'class-validator';
import {
  ORDER_V1_CUSTOMER_NAME_MAX_LENGTH,
  ORDER_V1_CUSTOMER_NAME_MIN_LENGTH,
  ORDER_V1_MAX_QUANTITY,
} from './order.constraints';

const QUANTITY_MESSAGE = `Quantity must be between 1 and ${ORDER_V1_MAX_QUANTITY}.`;

export class CreateOrderV1Dto {
  @ApiProperty({
    example: 'Jane Doe',
    minLength: ORDER_V1_CUSTOMER_NAME_MIN_LENGTH,
    maxLength: ORDER_V1_CUSTOMER_NAME_MAX_LENGTH,
  })
  @IsNotEmpty({ message: 'Customer name is required.' })
  @IsString({ message: 'Customer name must be a string.' })
  @Length(ORDER_V1_CUSTOMER_NAME_MIN_LENGTH, ORDER_V1_CUSTOMER_NAME_MAX_LENGTH, {
    message: `Customer name must be between ${ORDER_V1_CUSTOMER_NAME_MIN_LENGTH} and ${ORDER_V1_CUSTOMER_NAME_MAX_LENGTH} characters.`,
  })
  customerName!: string;

  @ApiProperty({ example: 'Mechanical keyboard' })
  @IsNotEmpty({ message: 'Product name is required.' })
  @IsString({ message: 'Product name must be a string.' })
  productName!: string;

  @ApiProperty({ minimum: 1, maximum: ORDER_V1_MAX_QUANTITY, example: 2 })
  @IsInt({ message: QUANTITY_MESSAGE })
  @Min(1, { message: QUANTITY_MESSAGE })
  @Max(ORDER_V1_MAX_QUANTITY, { message: QUANTITY_MESSAGE })
  quantity!: number;
}
