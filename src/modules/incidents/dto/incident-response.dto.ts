import { ApiProperty } from '@nestjs/swagger';
import { SEVERITY_NAMES, type SeverityName } from '../models/incident-severity';

export class IncidentResponseDto {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty()
  userDescription!: string;

  @ApiProperty({ nullable: true, type: String })
  structuredSummary!: string | null;

  @ApiProperty({ enum: [...SEVERITY_NAMES], example: 'Critical' })
  severity!: SeverityName;

  @ApiProperty({ type: [String], example: ['network', 'production'] })
  tags!: string[];

  @ApiProperty({ format: 'date-time' })
  createdAt!: string;

  @ApiProperty({ description: 'Correlation ID of the creating request' })
  correlationId!: string;
}
