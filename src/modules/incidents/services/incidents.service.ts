import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { BusinessException } from '../../../common/exceptions/business-exceptions';
import type { RequestContext } from '../../common/context/request-context';
import { CreateIncidentDto } from '../dto/create-incident.dto';
import { IncidentResponseDto } from '../dto/incident-response.dto';
import type { Incident } from '../models/incident.model';
import { parseSeverity, severityName } from '../models/incident-severity';
import { INCIDENT_REPOSITORY, type IncidentRepository } from '../repositories/incident.repository';
import {
  INCIDENT_ENRICHER,
  type IncidentEnricher,
} from '../enrichment/incident-enricher.interface';

/**
 * Incidents Service
 *
 * Creates, looks up and lists incidents. Faults are raised as
 * BusinessException and left to the exception boundary; nothing is caught here.
 */
@Injectable()
export class IncidentsService {
  constructor(
    @Inject(INCIDENT_REPOSITORY) private readonly repository: IncidentRepository,
    @Inject(INCIDENT_ENRICHER) private readonly enricher: IncidentEnricher,
  ) {}

  async create(dto: CreateIncidentDto, context: RequestContext): Promise<IncidentResponseDto> {
    const correlationId = context.requireCorrelationId();
    const logger = context.getLogger(IncidentsService.name);

    logger.log('Creating incident', {
      descriptionLength: dto.userDescription.length,
      manualSeverity: dto.manualSeverity,
    });

    const enrichment = await this.enricher.enrich(
      dto.userDescription,
      correlationId,
      context.signal,
    );

    logger.log('Incident enriched', {
      severity: severityName(enrichment.severity),
      tags: enrichment.tags,
      processingDurationMs: enrichment.processingDuration,
      confidenceScore: enrichment.confidenceScore,
    });

    const incident: Incident = {
      id: randomUUID(),
      userDescription: dto.userDescription,
      structuredSummary: enrichment.structuredSummary,
      severity: dto.manualSeverity ?? enrichment.severity,
      tags: enrichment.tags,
      createdAt: new Date(),
      correlationId,
    };

    await this.repository.add(incident);

    logger.log('Incident created', {
      incidentId: incident.id,
      severity: severityName(incident.severity),
    });

    return toResponse(incident);
  }

  async findById(id: string, context: RequestContext): Promise<IncidentResponseDto> {
    const incident = await this.repository.findById(id);

    if (!incident) {
      context.getLogger(IncidentsService.name).warn('Incident not found', { incidentId: id });
      throw BusinessException.notFound(`No incident exists with ID: ${id}`);
    }

    return toResponse(incident);
  }

  /**
   * List incidents, optionally filtered by severity name; unknown names do not filter
   */
  async list(severity: string | undefined, context: RequestContext): Promise<IncidentResponseDto[]> {
    const filter = severity ? parseSeverity(severity) : undefined;

    context.getLogger(IncidentsService.name).log('Listing incidents', {
      filter: severity ?? 'none',
      applied: filter !== undefined,
    });

    const incidents = await this.repository.list({ severity: filter });
    return incidents.map(toResponse);
  }
}

function toResponse(incident: Incident): IncidentResponseDto {
  return {
    id: incident.id,
    userDescription: incident.userDescription,
    structuredSummary: incident.structuredSummary,
    severity: severityName(incident.severity),
    tags: [...incident.tags],
    createdAt: incident.createdAt.toISOString(),
    correlationId: incident.correlationId,
  };
}
