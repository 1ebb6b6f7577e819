import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString } from 'class-validator';

export class ListIncidentsQueryDto {
  @ApiPropertyOptional({
    description: 'Severity name (case-insensitive). Unknown names do not filter.',
    example: 'critical',
  })
  @IsOptional()
  @IsString()
  severity?: string;
}
