import { ApiProperty } from '@nestjs/swagger';
import { API_VERSIONS, type ApiVersion } from '../../common/versioning/versioned-resources';

export class OrderResponseDto {
  @ApiProperty({ format: 'uuid' })
  orderId!: string;

  @ApiProperty({ example: 'Pending' })
  status!: string;

  @ApiProperty({ format: 'date-time' })
  createdAt!: string;

  @ApiProperty({ enum: Object.values(API_VERSIONS) })
  apiVersion!: ApiVersion;
}
