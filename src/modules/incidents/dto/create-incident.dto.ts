import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsNotEmpty, IsOptional, IsString, Length } from 'class-validator';
import { IncidentSeverity, SEVERITY_VALUES } from '../models/incident-severity';
import {
  INCIDENT_DESCRIPTION_MAX_LENGTH,
  INCIDENT_DESCRIPTION_MIN_LENGTH,
} from './incident.constraints';

/**
 * DTO for incident creation
 *
 * Validated by the global AppValidationPipe before the handler runs; an
 * invalid body never reaches IncidentsService.
 */
export class CreateIncidentDto {
  @ApiProperty({
    description: 'Description of the incident as reported by the user',
    example: 'Checkout service is down in production, customers see a 502 outage page',
    minLength: INCIDENT_DESCRIPTION_MIN_LENGTH,
    maxLength: INCIDENT_DESCRIPTION_MAX_LENGTH,
  })
  @IsNotEmpty({ message: 'User description is required.' })
  @IsString({ message: 'User description must be a string.' })
  @Length(INCIDENT_DESCRIPTION_MIN_LENGTH, INCIDENT_DESCRIPTION_MAX_LENGTH, {
    message: `Description must be between ${INCIDENT_DESCRIPTION_MIN_LENGTH} and ${INCIDENT_DESCRIPTION_MAX_LENGTH} characters.`,
  })
  userDescription!: string;

  @ApiPropertyOptional({
    description: 'Severity set by the reporter; overrides the enrichment result',
    enum: IncidentSeverity,
    example: IncidentSeverity.High,
  })
  @IsOptional()
  @IsIn(SEVERITY_VALUES, {
    message: 'Manual severity must be 1 (Low), 2 (Medium), 3 (High) or 4 (Critical).',
  })
  manualSeverity?: IncidentSeverity;
}
